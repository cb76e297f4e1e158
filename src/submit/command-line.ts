/**
 * Command-line handling for enqueued commands: quote checks, shell-style word splitting and executable/argument separation.
 */

import { BadQuotes, InvalidSettingError } from '../lib/errors.js';

/**
 * True when `line` holds a double quote that is not escaped as `""` or `\"`. Such a quote would end the quoted Arguments value early.
 */
export function hasUnescapedQuote(line: string): boolean {
  return line.replace(/""/g, '').replace(/\\"/g, '').includes('"');
}

/**
 * Split `line` into words the way a POSIX shell does: whitespace separates words, single quotes are literal, double quotes allow backslash escapes, and a backslash outside quotes escapes the next character.
 */
export function splitShellWords(line: string): string[] {
  const words: string[] = [];
  let word = '';
  let inWord = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < line.length; i += 1) {
    const ch = line.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      continue;
    }

    if (quote === '"') {
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && i + 1 < line.length && '\\"$`\n'.includes(line.charAt(i + 1))) {
        i += 1;
        word += line.charAt(i);
      } else {
        word += ch;
      }
      continue;
    }

    if (/\s/.test(ch)) {
      if (inWord) {
        words.push(word);
        word = '';
        inWord = false;
      }
      continue;
    }

    inWord = true;
    if (ch === "'" || ch === '"') {
      quote = ch;
    } else if (ch === '\\' && i + 1 < line.length) {
      i += 1;
      word += line.charAt(i);
    } else {
      word += ch;
    }
  }

  if (quote) throw new BadQuotes(quote);
  if (inWord) words.push(word);
  return words;
}

/** Executable and argument string of one command line. */
export interface SplitCommand {
  /** First shell word, with quoting and escapes removed. */
  executable: string;
  /** Everything after the executable, as written. Empty when there are none. */
  arguments: string;
}

/** True when a piece ends in a backslash or leaves a single quote open. */
function continues(piece: string): boolean {
  return piece.endsWith('\\') || (piece.split("'").length - 1) % 2 === 1;
}

/**
 * Separate the executable from its arguments. A whitespace-separated piece ending in `\` continues into the next piece, and so does a piece that leaves a single quote open: `my\ tool -v` and `'my tool' -v` both have the executable `my tool` and the arguments `-v`.
 */
export function splitCommandLine(line: string): SplitCommand {
  const executable = splitShellWords(line)[0];
  if (executable === undefined) {
    throw new InvalidSettingError('Executable', 'the command line is empty');
  }

  // words at even indexes, the whitespace runs between them at odd ones
  const pieces = line.trim().split(/(\s+)/);
  let head = pieces[0] ?? '';
  let next = 1;
  while (continues(head) && next + 1 < pieces.length) {
    head += `${pieces[next] ?? ''}${pieces[next + 1] ?? ''}`;
    next += 2;
  }

  return { executable, arguments: pieces.slice(next + 1).join('') };
}

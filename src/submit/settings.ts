/**
 * Pending submission attributes and the submission text flushed so far.
 *
 * Flushing consumes the current attributes: after `flush()` the next stanza starts empty, and anything it needs (resources included) must be set again.
 *
 * @module
 */

import type { z } from 'zod';

import {
  EmptySetting,
  InvalidSettingError,
  InvalidUniverseError,
  RequiredSetting,
} from '../lib/errors.js';
import {
  notificationSchema,
  resourceSchema,
  transferFilesSchema,
  type Notification,
  type TransferFiles,
  universeSchema,
  type Universe,
  whenToTransferOutputSchema,
  type WhenToTransferOutput,
} from '../schemas/settings.js';

/** Value type of every attribute. */
export interface SettingTypes {
  universe: Universe;
  executable: string;
  arguments: string;
  initialDirectory: string;
  input: string;
  output: string;
  error: string;
  log: string;
  requirements: string;
  concurrencyLimits: string;
  cpus: number;
  memoryMb: number;
  diskMb: number;
  transferExecutable: boolean;
  shouldTransferFiles: TransferFiles;
  whenToTransferOutput: WhenToTransferOutput;
  notification: Notification;
  notifyUser: string;
}

export type SettingName = keyof SettingTypes;

/** Attribute names as written to the submission description. */
export const SETTING_KEYS: Record<SettingName, string> = {
  universe: 'Universe',
  executable: 'Executable',
  arguments: 'Arguments',
  initialDirectory: 'initialdir',
  input: 'Input',
  output: 'Output',
  error: 'Error',
  log: 'Log',
  requirements: 'Requirements',
  concurrencyLimits: 'concurrency_limits',
  cpus: 'request_cpus',
  memoryMb: 'request_memory',
  diskMb: 'request_disk',
  transferExecutable: 'transfer_executable',
  shouldTransferFiles: 'should_transfer_files',
  whenToTransferOutput: 'when_to_transfer_output',
  notification: 'notification',
  notifyUser: 'notify_user',
};

/** Attributes a stanza cannot do without. */
const REQUIRED: ReadonlySet<SettingName> = new Set([
  'universe',
  'executable',
  'arguments',
]);

function validate<T>(schema: z.ZodType<T>, setting: string, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidSettingError(
      setting,
      result.error.issues.map((issue) => issue.message).join('; '),
    );
  }
  return result.data;
}

export class SubmissionSettings {
  private values: Partial<SettingTypes> = {};
  private order: SettingName[] = [];
  private text = '';

  /** Submission text flushed so far. */
  get submitText(): string {
    return this.text;
  }

  /** True when `name` is set in the current stanza. */
  has(name: SettingName): boolean {
    return this.values[name] !== undefined;
  }

  /** Current attributes as `[key, value]` pairs in insertion order. */
  entries(): Array<[string, string]> {
    return this.order.map((name) => [
      SETTING_KEYS[name],
      String(this.values[name]),
    ]);
  }

  /**
   * Serialize the current attributes as `key = value` lines after the text flushed so far.
   *
   * With `clearAfter` the lines become part of the submission text and the attributes are emptied. Without it nothing changes and the result is a preview.
   */
  flush(clearAfter = true): string {
    const lines = this.entries()
      .map(([key, value]) => `${key} = ${value}\n`)
      .join('');
    const all = this.text + lines;
    if (clearAfter) {
      this.text = all;
      this.values = {};
      this.order = [];
    }
    return all;
  }

  /** Append a raw line, such as a `Queue` directive, to the submission text. */
  appendDirective(line: string): void {
    this.text += `${line}\n`;
  }

  getUniverse(): Universe {
    return this.get('universe');
  }

  setUniverse(value: string): void {
    const parsed = universeSchema.safeParse(value);
    if (!parsed.success) throw new InvalidUniverseError(value);
    this.set('universe', parsed.data);
  }

  getExecutable(): string {
    return this.get('executable');
  }

  setExecutable(path: string): void {
    this.set('executable', path);
  }

  /** Arguments as written, including the surrounding double quotes. */
  getArguments(): string {
    return this.get('arguments');
  }

  /** Wraps `value` in double quotes; a `\"` inside becomes the scheduler's `""` escape. */
  setArguments(value: string): void {
    this.set('arguments', `"${value.replace(/\\"/g, '""')}"`);
  }

  getInitialDirectory(): string {
    return this.get('initialDirectory');
  }

  setInitialDirectory(path: string): void {
    this.set('initialDirectory', path);
  }

  getInput(): string {
    return this.get('input');
  }

  setInput(path: string): void {
    this.set('input', path);
  }

  getOutput(): string {
    return this.get('output');
  }

  setOutput(path: string): void {
    this.set('output', path);
  }

  getError(): string {
    return this.get('error');
  }

  setError(path: string): void {
    this.set('error', path);
  }

  getLog(): string {
    return this.get('log');
  }

  setLog(path: string): void {
    this.set('log', path);
  }

  getRequirements(): string {
    return this.get('requirements');
  }

  setRequirements(expression: string): void {
    this.set('requirements', expression);
  }

  /** Whether the stanza holds a MATLAB license token. */
  getMatlabLock(): boolean {
    return this.get('concurrencyLimits').toLowerCase().includes('matlab');
  }

  setMatlabLock(enabled: boolean): void {
    if (enabled) {
      this.set('concurrencyLimits', 'MATLAB');
    } else {
      this.delete('concurrencyLimits');
    }
  }

  getCpus(): number {
    return this.get('cpus');
  }

  setCpus(count: number): void {
    this.set('cpus', validate(resourceSchema, SETTING_KEYS.cpus, count));
  }

  getMemory(): number {
    return this.get('memoryMb');
  }

  setMemory(megabytes: number): void {
    this.set(
      'memoryMb',
      validate(resourceSchema, SETTING_KEYS.memoryMb, megabytes),
    );
  }

  getDisk(): number {
    return this.get('diskMb');
  }

  setDisk(megabytes: number): void {
    this.set('diskMb', validate(resourceSchema, SETTING_KEYS.diskMb, megabytes));
  }

  getTransferExecutable(): boolean {
    return this.get('transferExecutable');
  }

  setTransferExecutable(value: boolean): void {
    if (typeof value !== 'boolean') {
      throw new TypeError(
        `setTransferExecutable(): boolean argument expected, but ${typeof value} given.`,
      );
    }
    this.set('transferExecutable', value);
  }

  getShouldTransferFiles(): TransferFiles {
    return this.get('shouldTransferFiles');
  }

  setShouldTransferFiles(value: string): void {
    this.set(
      'shouldTransferFiles',
      validate(transferFilesSchema, SETTING_KEYS.shouldTransferFiles, value),
    );
  }

  getWhenToTransferOutput(): WhenToTransferOutput {
    return this.get('whenToTransferOutput');
  }

  setWhenToTransferOutput(value: string): void {
    this.set(
      'whenToTransferOutput',
      validate(
        whenToTransferOutputSchema,
        SETTING_KEYS.whenToTransferOutput,
        value,
      ),
    );
  }

  getNotification(): Notification {
    return this.get('notification');
  }

  setNotification(value: string): void {
    this.set(
      'notification',
      validate(notificationSchema, SETTING_KEYS.notification, value),
    );
  }

  getNotifyUser(): string {
    return this.get('notifyUser');
  }

  setNotifyUser(address: string): void {
    this.set('notifyUser', address);
  }

  private get<K extends SettingName>(name: K): SettingTypes[K] {
    const value = this.values[name];
    if (value === undefined) {
      const key = SETTING_KEYS[name];
      throw REQUIRED.has(name) ? new RequiredSetting(key) : new EmptySetting(key);
    }
    return value;
  }

  private set<K extends SettingName>(name: K, value: SettingTypes[K]): void {
    if (!this.order.includes(name)) this.order.push(name);
    this.values[name] = value;
  }

  private delete(name: SettingName): void {
    this.order = this.order.filter((entry) => entry !== name);
    delete this.values[name];
  }
}

import crypto from 'node:crypto';

export function now(): number {
  return Date.now();
}

export function randomToken(prefix: string): string {
  return `${prefix}_${crypto.randomUUID()}_${crypto.randomBytes(8).toString('hex')}`;
}

export function maskPhone(phone: string): string {
  const digits = phone.replace(/\s+/g, '');
  if (digits.length <= 4) {
    return digits;
  }
  return `${'*'.repeat(digits.length - 4)}${digits.slice(-4)}`;
}

/**
 * Runs tasks one after another in submission order. A rejected task does not
 * stop the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<unknown> = Promise.resolve();

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task, task);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

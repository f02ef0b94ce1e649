/**
 * Progress reporting for clone runs.
 */
export interface CloneLogger {
  step(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Terminal logger: [*] for steps, [+] for completed work, [!] for problems.
 */
export function createConsoleLogger(): CloneLogger {
  return {
    step: message => console.log(`[*] ${message}`),
    success: message => console.log(`[+] ${message}`),
    warn: message => console.warn(`[!] ${message}`),
    error: message => console.error(`[!] ${message}`)
  };
}

/**
 * Collects messages instead of printing them. Used by the HTTP API and tests.
 */
export class MemoryLogger implements CloneLogger {
  readonly lines: string[] = [];

  step(message: string): void {
    this.lines.push(`step: ${message}`);
  }

  success(message: string): void {
    this.lines.push(`success: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }

  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }
}

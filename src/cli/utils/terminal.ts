import { ValidationError } from "../../lib/errors";

export function writeStdout(message: string): void {
  process.stdout.write(`${message}\n`);
}

export function writeStderr(message: string): void {
  process.stderr.write(`${message}\n`);
}

export function parsePositiveInt(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ValidationError(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

export function parseChoice<T extends string>(value: string, choices: readonly T[], name: string): T {
  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new ValidationError(`${name} must be one of ${choices.join(", ")}, got "${value}"`);
  }
  return match;
}

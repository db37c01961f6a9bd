import { InvalidArgumentError } from 'commander';

const INTEGER_PATTERN = /^-?\d+$/;

/**
 * A commander argument parser accepting integers in [min, max].
 *
 * @example
 * command.option('--depth <n>', 'Stockfish depth', intOption(1, 99), 14);
 */
export function intOption(min: number, max: number): (value: string) => number {
  return (value) => {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) {
      throw new InvalidArgumentError('Not an integer.');
    }

    const parsed = Number(trimmed);
    if (parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Must be between ${min} and ${max}.`);
    }
    return parsed;
  };
}

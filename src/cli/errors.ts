/**
 * A problem with how a command was invoked, such as an input file with
 * nothing to import. Printed as `Error: <message>` with exit code 1.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Error thrown when a line of user input cannot be turned into a message.
 */
export class CommandSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandSyntaxError';
  }
}

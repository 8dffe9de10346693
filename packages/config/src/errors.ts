export class ConfigInvalidError extends Error {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    Object.setPrototypeOf(this, ConfigInvalidError.prototype);
    this.name = 'ConfigInvalidError';
    this.variable = variable;
  }
}

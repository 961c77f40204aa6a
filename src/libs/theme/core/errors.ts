export class InvalidThemeNameError extends Error {
  readonly retryable = false;
  readonly themeName: string;

  constructor(themeName: string) {
    super(
      `Invalid theme name "${themeName}". Use letters, digits, "-" or "_", starting with a letter or digit`,
    );
    this.name = "InvalidThemeNameError";
    this.themeName = themeName;
  }
}

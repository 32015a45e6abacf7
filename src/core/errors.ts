export class InvalidArgumentError extends Error {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

export class CatalogIntegrityError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message} ${issues.join("; ")}` : message);
    this.name = "CatalogIntegrityError";
    this.issues = issues;
  }
}

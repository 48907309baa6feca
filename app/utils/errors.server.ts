import type { CanonicalField } from "~/types/tickets";

export class TicketImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class UnparsableTableError extends TicketImportError {
  readonly attempts: string[];

  constructor(attempts: string[]) {
    super("Could not read the uploaded file as a table with any delimiter or encoding.");
    this.attempts = attempts;
  }
}

export class MissingRequiredColumnsError extends TicketImportError {
  readonly missing: CanonicalField[];

  constructor(missing: CanonicalField[]) {
    super(
      `Missing required columns: ${missing.join(", ")}. Check the export headers or extend the column aliases.`
    );
    this.missing = missing;
  }
}

import type { SlotName } from "../../types/palette";

export class InsufficientDistinctColorsError extends Error {
  readonly retryable = false;
  readonly found: number;
  readonly minimum: number;

  constructor(args: { found: number; minimum: number; message?: string }) {
    super(
      args.message ??
        `can only find ${args.found} (< ${args.minimum}) distinct colours`,
    );
    this.name = "InsufficientDistinctColorsError";
    this.found = args.found;
    this.minimum = args.minimum;
  }
}

export class InvalidHueSelectionError extends Error {
  readonly retryable = false;
  readonly hues: readonly string[];

  constructor(hues: readonly string[]) {
    super(`Bad hue selection: [${hues.join(", ")}]. Use one or two of red, green, blue`);
    this.name = "InvalidHueSelectionError";
    this.hues = hues;
  }
}

export class IncompleteAssignmentError extends Error {
  readonly retryable = false;
  readonly slot: SlotName | string;

  constructor(slot: SlotName | string, message?: string) {
    super(message ?? `No colour or reuse rule available for ${slot}`);
    this.name = "IncompleteAssignmentError";
    this.slot = slot;
  }
}

export class InvalidColorError extends Error {
  readonly retryable = false;
  readonly value: unknown;

  constructor(value: unknown, message?: string) {
    super(message ?? `Invalid colour: ${JSON.stringify(value)}`);
    this.name = "InvalidColorError";
    this.value = value;
  }
}

import type { Stage } from "../types";

/**
 * Raised when the input is not an array of record objects.
 * Fatal for the whole run: nothing is written after it.
 */
export class InputShapeError extends Error {
  readonly stage: Stage;

  constructor(stage: Stage, message: string) {
    super(message);
    this.name = "InputShapeError";
    this.stage = stage;
  }
}

import { Data } from "effect";

export class InvalidInputError extends Data.TaggedError('InvalidInput')<{
  readonly field: string;
  readonly message: string;
}> {}

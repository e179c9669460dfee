import { Schema } from "effect";

export class InvalidSpanError extends Schema.TaggedError<InvalidSpanError>()(
  "InvalidSpanError",
  {
    start: Schema.String,
    end: Schema.String,
    message: Schema.String,
  }
) {}

export class SegmentOverlapError extends Schema.TaggedError<SegmentOverlapError>()(
  "SegmentOverlapError",
  {
    line: Schema.Number,
    message: Schema.String,
  }
) {}

export class StyleStringError extends Schema.TaggedError<StyleStringError>()(
  "StyleStringError",
  {
    reason: Schema.Literal("invalid-color", "unknown-keyword"),
    token: Schema.String,
    message: Schema.String,
  }
) {}

export class ThemeDecodeError extends Schema.TaggedError<ThemeDecodeError>()(
  "ThemeDecodeError",
  {
    theme: Schema.String,
    message: Schema.String,
  }
) {}

import { Schema } from "effect";

/** An extra folding step applied after the built-in folds. */
export type UnicodeTransformer = (input: string) => string;

export const NormalizerFoldsSchema = Schema.Struct({
  caseFold: Schema.Boolean,
  diacriticFold: Schema.Boolean,
  widthFold: Schema.Boolean,
});

export type NormalizerFolds = Schema.Schema.Type<typeof NormalizerFoldsSchema>;

export interface NormalizerOptions extends Partial<NormalizerFolds> {
  readonly transformers?: readonly UnicodeTransformer[];
}

export const defaultNormalizerFolds: NormalizerFolds = {
  caseFold: true,
  diacriticFold: true,
  widthFold: false,
};

const WIDE_FORM_RE = /[\u3000\uFF01-\uFFEF]/gu;
const COMBINING_MARK_RE = /\p{Mn}/gu;

const foldWidth = (input: string) =>
  input.replace(WIDE_FORM_RE, (char) => char.normalize("NFKC"));

const foldDiacritics = (input: string) =>
  input.normalize("NFD").replace(COMBINING_MARK_RE, "").normalize("NFC");

// Upper-then-lower gives full folding: "ß" becomes "ss", "ﬁ" becomes "fi".
// Per code point, so final sigma folds like any other sigma.
const foldCase = (input: string) =>
  Array.from(input, (char) => char.toUpperCase().toLowerCase()).join("");

/**
 * Folds strings for search. The pipeline is built once; `normalize` keeps no
 * state between calls.
 */
export class Normalizer {
  readonly folds: NormalizerFolds;
  private readonly pipeline: readonly UnicodeTransformer[];

  constructor(options: NormalizerOptions = {}) {
    this.folds = {
      caseFold: options.caseFold ?? defaultNormalizerFolds.caseFold,
      diacriticFold:
        options.diacriticFold ?? defaultNormalizerFolds.diacriticFold,
      widthFold: options.widthFold ?? defaultNormalizerFolds.widthFold,
    };
    const pipeline: UnicodeTransformer[] = [];
    if (this.folds.widthFold) {
      pipeline.push(foldWidth);
    }
    if (this.folds.diacriticFold) {
      pipeline.push(foldDiacritics);
    }
    if (this.folds.caseFold) {
      pipeline.push(foldCase);
    }
    pipeline.push(...(options.transformers ?? []));
    this.pipeline = pipeline;
  }

  normalize(input: string): string {
    let output = input;
    for (const transform of this.pipeline) {
      output = transform(output);
    }
    return output;
  }
}

export const defaultNormalizer = new Normalizer();

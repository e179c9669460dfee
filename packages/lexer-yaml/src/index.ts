export { isTerminatedQuote, plainScalarKind, unquote } from "./scalar.js";
export { tokenizeYaml, yamlClassifier } from "./tokenizer.js";

/** Injection token for the language model the evaluation client talks to. */
export const LANGUAGE_MODEL = Symbol('LANGUAGE_MODEL');

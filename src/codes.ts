import { randomInt } from "crypto";
import { ALPHANUMERIC, DEFAULT_CODE_LENGTH } from "./config";

// Returns an integer in [0, max). crypto.randomInt has no modulo bias, so
// every character of the alphabet is equally likely.
export type RandomIndex = (max: number) => number;

export type CodeGenerator = () => string;

export interface CodeGeneratorOptions {
  length?: number;
  alphabet?: string;
  random?: RandomIndex;
}

// Builds a function that returns a fresh random code on every call.
// Codes are NOT guaranteed unique; the store's UNIQUE constraint decides that.
export function createCodeGenerator(options: CodeGeneratorOptions = {}): CodeGenerator {
  const length = options.length ?? DEFAULT_CODE_LENGTH;
  const alphabet = options.alphabet ?? ALPHANUMERIC;
  const random = options.random ?? ((max: number) => randomInt(max));

  if (length < 1) {
    throw new RangeError(`Code length must be at least 1, got ${length}`);
  }
  if (alphabet.length < 2) {
    throw new RangeError("Code alphabet needs at least 2 characters");
  }

  return () => {
    let code = "";
    for (let i = 0; i < length; i++) {
      code += alphabet[random(alphabet.length)];
    }
    return code;
  };
}

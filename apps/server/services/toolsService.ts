import {
  asciiToText,
  extractNumbers,
  formatAsciiCodes,
  letterPermutations,
  letterToNumber,
  numberToLetter,
  reverseText,
  solveAnagram,
  textToAscii,
} from "@utils";
import type { ToolsRequest } from "@shared/schema";

export type ToolsResult =
  | { mode: "ascii-to-text" | "reverse"; result: string }
  | { mode: "text-to-ascii"; result: string; codes: number[] }
  | { mode: "anagram" | "permutations"; result: string[]; count: number }
  | { mode: "a1z26"; result: string; direction: "to-numbers" | "to-letters" }
  | { mode: "extract-numbers"; result: number[] };

export function runTools(request: ToolsRequest, wordList: readonly string[]): ToolsResult {
  switch (request.mode) {
    case "ascii-to-text":
      return { mode: request.mode, result: asciiToText(request.input) };
    case "text-to-ascii": {
      const codes = textToAscii(request.input);
      return { mode: request.mode, result: formatAsciiCodes(codes), codes };
    }
    case "anagram": {
      const words = solveAnagram(request.input, wordList);
      return { mode: request.mode, result: words, count: words.length };
    }
    case "permutations": {
      const permutations = letterPermutations(request.input);
      return { mode: request.mode, result: permutations, count: permutations.length };
    }
    case "a1z26":
      return {
        mode: request.mode,
        direction: request.direction,
        result: request.direction === "to-numbers"
          ? letterToNumber(request.input, request.offset).join(" ")
          : numberToLetter(request.input, request.offset),
      };
    case "reverse":
      return { mode: request.mode, result: reverseText(request.input, request.wordsOnly) };
    case "extract-numbers":
      return { mode: request.mode, result: extractNumbers(request.input) };
  }
}

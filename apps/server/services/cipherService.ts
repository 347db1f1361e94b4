import {
  atbash,
  caesarDecode,
  caesarEncode,
  frequencyAnalysis,
  morseDecode,
  morseEncode,
  substitutionDecode,
  vigenereDecode,
  vigenereEncode,
  type LetterFrequency,
} from "@utils";
import type { CipherRequest } from "@shared/schema";

export interface CipherResult {
  mode: CipherRequest["mode"];
  result: string | LetterFrequency[];
}

export function runCipher(request: CipherRequest): CipherResult {
  switch (request.mode) {
    case "caesar":
      return {
        mode: request.mode,
        result: request.encode
          ? caesarEncode(request.text, request.shift)
          : caesarDecode(request.text, request.shift),
      };
    case "vigenere":
      return {
        mode: request.mode,
        result: request.encode
          ? vigenereEncode(request.text, request.key)
          : vigenereDecode(request.text, request.key),
      };
    case "atbash":
      return { mode: request.mode, result: atbash(request.text) };
    case "morse":
      return {
        mode: request.mode,
        result: request.encode ? morseEncode(request.text) : morseDecode(request.text),
      };
    case "frequency":
      return { mode: request.mode, result: frequencyAnalysis(request.text) };
    case "substitution":
      return { mode: request.mode, result: substitutionDecode(request.text, request.mappings) };
  }
}

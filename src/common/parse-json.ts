import { JsonValue } from './json';

const INTEGER_TOKEN = /^-?\d+$/;
const NUMBER_CHAR = /[0-9eE.+-]/;

function endOfString(text: string, start: number): number {
  let index = start + 1;
  while (index < text.length) {
    if (text[index] === '\\') {
      index += 2;
    } else if (text[index] === '"') {
      return index + 1;
    } else {
      index++;
    }
  }
  return text.length;
}

/**
 * Wraps integer literals outside the safe integer range in quotes, so they
 * parse to their exact digits instead of a rounded number. String contents
 * are copied untouched.
 */
export function quoteUnsafeIntegers(text: string): string {
  let output = '';
  let index = 0;

  while (index < text.length) {
    const char = text[index];

    if (char === '"') {
      const end = endOfString(text, index);
      output += text.slice(index, end);
      index = end;
    } else if (char === '-' || (char >= '0' && char <= '9')) {
      let end = index + 1;
      while (end < text.length && NUMBER_CHAR.test(text[end])) {
        end++;
      }
      const token = text.slice(index, end);
      output +=
        INTEGER_TOKEN.test(token) && !Number.isSafeInteger(Number(token)) ? `"${token}"` : token;
      index = end;
    } else {
      output += char;
      index++;
    }
  }

  return output;
}

/** `JSON.parse` that keeps integers beyond 2^53 as their digit strings. Throws on invalid JSON. */
export function parseJsonPreservingIntegers(text: string): JsonValue {
  const parsed: JsonValue = JSON.parse(quoteUnsafeIntegers(text));
  return parsed;
}

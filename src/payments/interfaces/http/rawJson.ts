export type JsonLiteral = {
  kind: "string" | "number" | "keyword";
  /** Decoded value for strings, the source token otherwise. */
  text: string;
};

const TOKEN = /"(?:[^"\\]|\\.)*"|[{}[\],:]|[^\s{}[\],:"]+/g;

const decodeString = (token: string): string | undefined => {
  const decoded: unknown = JSON.parse(token);
  return typeof decoded === "string" ? decoded : undefined;
};

const toLiteral = (token: string): JsonLiteral | undefined => {
  if (token.startsWith('"')) {
    const text = decodeString(token);
    return text === undefined ? undefined : { kind: "string", text };
  }
  return { kind: /^-?\d/.test(token) ? "number" : "keyword", text: token };
};

/**
 * Returns the primitive members of a top-level JSON object as they are written
 * in `source`, so `100.00` stays `100.00`. Nested objects and arrays are
 * skipped. Expects text that JSON.parse already accepted; like JSON.parse, the
 * last occurrence of a repeated key wins.
 */
export const readTopLevelLiterals = (source: string): Map<string, JsonLiteral> => {
  const literals = new Map<string, JsonLiteral>();
  let depth = 0;
  let key: string | undefined;
  let awaitingValue = false;

  for (const [token] of source.matchAll(TOKEN)) {
    if (token === "{" || token === "[") {
      if (depth === 1) {
        key = undefined;
        awaitingValue = false;
      }
      depth += 1;
      continue;
    }
    if (token === "}" || token === "]") {
      depth -= 1;
      continue;
    }
    if (depth !== 1) {
      continue;
    }
    if (token === ",") {
      key = undefined;
      continue;
    }
    if (token === ":") {
      awaitingValue = key !== undefined;
      continue;
    }
    if (awaitingValue && key !== undefined) {
      const literal = toLiteral(token);
      if (literal) {
        literals.set(key, literal);
      }
      key = undefined;
      awaitingValue = false;
      continue;
    }
    if (token.startsWith('"')) {
      key = decodeString(token);
    }
  }
  return literals;
};

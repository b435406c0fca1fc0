import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import {
  ConfigNotFoundError,
  ConfigParseError,
  ConfigReadError,
} from "./errors.js";

type TokenKind = "identifier" | "string" | "regex" | "number" | "punct";

interface Token {
  kind: TokenKind;
  text: string;
  start: number;
  end: number;
}

interface BlockFrame {
  opener: "{" | "[" | "(";
  name: string | null;
  start: number;
  chainIdRaw: string | null;
}

interface MatchedBlock {
  name: string;
  rawValue: string;
  start: number;
}

const UINT_DECIMAL_PATTERN = /^(0|[1-9][0-9]*)$/;
const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[A-Za-z0-9_$]/;
const NUMBER_PART = /[A-Za-z0-9_.]/;
const CLOSERS = new Set(["}", "]", ")"]);

interface ScannedLiteral {
  end: number;
  text: string;
}

// Quoted strings end at a raw newline; only template literals span lines.
function scanString(source: string, start: number): ScannedLiteral {
  const quote = source[start];
  let index = start + 1;
  while (index < source.length) {
    const char = source[index];
    if (char === "\\") {
      index += 2;
      continue;
    }
    if (char === quote) {
      return { end: index + 1, text: source.slice(start + 1, index) };
    }
    if (char === "\n" && quote !== "`") {
      break;
    }
    index += 1;
  }
  const end = Math.min(index, source.length);
  return { end, text: source.slice(start + 1, end) };
}

/**
 * Scans a regular expression literal starting at `start`. Returns null when
 * the line ends before the closing slash.
 */
function scanRegex(source: string, start: number): ScannedLiteral | null {
  let index = start + 1;
  let inClass = false;
  while (index < source.length) {
    const char = source[index];
    if (char === "\n") {
      return null;
    }
    if (char === "\\") {
      index += 2;
      continue;
    }
    if (char === "[") {
      inClass = true;
    } else if (char === "]") {
      inClass = false;
    } else if (char === "/" && !inClass) {
      let end = index + 1;
      while (end < source.length && IDENTIFIER_PART.test(source[end])) {
        end += 1;
      }
      return { end, text: source.slice(start, end) };
    }
    index += 1;
  }
  return null;
}

// Keywords after which a slash starts an operand rather than a division.
const REGEX_PRECEDING_KEYWORDS = new Set([
  "return",
  "typeof",
  "instanceof",
  "in",
  "of",
  "new",
  "delete",
  "void",
  "throw",
  "case",
  "do",
  "else",
  "yield",
  "await",
]);

function slashStartsRegex(previous: Token | undefined): boolean {
  if (previous === undefined) {
    return true;
  }
  switch (previous.kind) {
    case "identifier":
      return REGEX_PRECEDING_KEYWORDS.has(previous.text);
    case "punct":
      return !CLOSERS.has(previous.text);
    default:
      return false;
  }
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;

  while (index < source.length) {
    const char = source[index];
    const next = source[index + 1];

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (char === "/" && next === "/") {
      const lineEnd = source.indexOf("\n", index);
      index = lineEnd === -1 ? source.length : lineEnd + 1;
      continue;
    }

    if (char === "/" && next === "*") {
      const commentEnd = source.indexOf("*/", index + 2);
      index = commentEnd === -1 ? source.length : commentEnd + 2;
      continue;
    }

    if (char === '"' || char === "'" || char === "`") {
      const literal = scanString(source, index);
      tokens.push({
        kind: "string",
        text: literal.text,
        start: index,
        end: literal.end,
      });
      index = literal.end;
      continue;
    }

    if (char === "/" && slashStartsRegex(tokens[tokens.length - 1])) {
      const literal = scanRegex(source, index);
      if (literal !== null) {
        tokens.push({
          kind: "regex",
          text: literal.text,
          start: index,
          end: literal.end,
        });
        index = literal.end;
        continue;
      }
    }

    if (IDENTIFIER_START.test(char)) {
      let end = index + 1;
      while (end < source.length && IDENTIFIER_PART.test(source[end])) {
        end += 1;
      }
      tokens.push({
        kind: "identifier",
        text: source.slice(index, end),
        start: index,
        end,
      });
      index = end;
      continue;
    }

    if (/[0-9]/.test(char)) {
      let end = index + 1;
      while (end < source.length && NUMBER_PART.test(source[end])) {
        end += 1;
      }
      tokens.push({
        kind: "number",
        text: source.slice(index, end),
        start: index,
        end,
      });
      index = end;
      continue;
    }

    tokens.push({ kind: "punct", text: char, start: index, end: index + 1 });
    index += 1;
  }

  return tokens;
}

function openerOf(token: Token): BlockFrame["opener"] | null {
  if (token.kind !== "punct") {
    return null;
  }
  switch (token.text) {
    case "{":
      return "{";
    case "[":
      return "[";
    case "(":
      return "(";
    default:
      return null;
  }
}

function isPunct(token: Token | undefined, text: string): boolean {
  return token?.kind === "punct" && token.text === text;
}

function isKey(token: Token | undefined): token is Token {
  return token?.kind === "identifier" || token?.kind === "string";
}

/** A `key:` property sits right after the `{` or `,` that opens it. */
function isPropertyKeyAt(tokens: Token[], index: number): boolean {
  const previous = tokens[index - 1];
  return (
    isKey(tokens[index]) &&
    isPunct(tokens[index + 1], ":") &&
    (isPunct(previous, "{") || isPunct(previous, ","))
  );
}

function readFieldValue(
  source: string,
  tokens: Token[],
  valueStart: number,
): string {
  let depth = 0;
  let index = valueStart;
  let lastEnd: number | undefined;

  while (index < tokens.length) {
    const token = tokens[index];
    if (openerOf(token) !== null) {
      depth += 1;
    } else if (token.kind === "punct") {
      if (CLOSERS.has(token.text)) {
        if (depth === 0) {
          break;
        }
        depth -= 1;
      } else if (token.text === "," && depth === 0) {
        break;
      }
    }
    lastEnd = token.end;
    index += 1;
  }

  if (lastEnd === undefined) {
    return "";
  }
  return source.slice(tokens[valueStart].start, lastEnd).trim();
}

function matchNetworkBlocks(source: string): MatchedBlock[] {
  const tokens = tokenize(source);
  const stack: BlockFrame[] = [];
  const matches: MatchedBlock[] = [];

  for (let index = 0; index < tokens.length; index += 1) {
    const token = tokens[index];
    const opener = openerOf(token);

    if (opener !== null) {
      const keyIndex = index - 2;
      const name =
        opener === "{" &&
        keyIndex >= 0 &&
        isPropertyKeyAt(tokens, keyIndex)
          ? tokens[keyIndex].text
          : null;
      stack.push({
        opener,
        name,
        start: token.start,
        chainIdRaw: null,
      });
      continue;
    }

    if (token.kind === "punct" && CLOSERS.has(token.text)) {
      const frame = stack.pop();
      if (frame && frame.name !== null && frame.chainIdRaw !== null) {
        matches.push({
          name: frame.name,
          rawValue: frame.chainIdRaw,
          start: frame.start,
        });
      }
      continue;
    }

    const frame = stack.at(-1);
    if (
      frame?.opener === "{" &&
      token.text === "chainId" &&
      isPropertyKeyAt(tokens, index)
    ) {
      frame.chainIdRaw = readFieldValue(source, tokens, index + 2);
    }
  }

  return matches.sort((left, right) => left.start - right.start);
}

function parseChainId(network: string, rawValue: string): number {
  if (!UINT_DECIMAL_PATTERN.test(rawValue)) {
    throw new ConfigParseError(network, rawValue);
  }
  const chainId = Number(rawValue);
  if (!Number.isSafeInteger(chainId)) {
    throw new ConfigParseError(network, rawValue);
  }
  return chainId;
}

/**
 * Extracts `network -> chainId` pairs from hardhat config source text.
 *
 * A network is any `name: { ... }` object literal holding its own `chainId`
 * field; fields of nested objects belong to those objects only. Later
 * declarations of the same name replace earlier ones.
 */
export function extractNetworks(source: string): Map<string, number> {
  const networks = new Map<string, number>();
  for (const block of matchNetworkBlocks(source)) {
    networks.set(block.name, parseChainId(block.name, block.rawValue));
  }
  return networks;
}

export interface HardhatConfigSource {
  filePath: string;
  source: string;
}

export function loadHardhatConfig(
  rootDir: string,
  fileName: string,
): HardhatConfigSource {
  const filePath = path.resolve(rootDir, fileName);
  if (!existsSync(filePath)) {
    throw new ConfigNotFoundError(filePath);
  }
  try {
    return { filePath, source: readFileSync(filePath, "utf8") };
  } catch (error) {
    throw new ConfigReadError(filePath, error);
  }
}

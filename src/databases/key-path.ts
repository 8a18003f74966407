import { assertNever } from "../common/helpers-pure";
import type { PropertyValue } from "./property-value";
import { hasOwnProperty } from "./property-value";

export enum KeyPathSegmentKind {
  Key = "key",
  Index = "index",
}

interface KeySegment {
  kind: KeyPathSegmentKind.Key;
  name: string;
}

interface IndexSegment {
  kind: KeyPathSegmentKind.Index;
  index: number;
}

export type KeyPathSegment = KeySegment | IndexSegment;

export type KeyPath = readonly KeyPathSegment[];

export class InvalidKeyPathError extends Error {
  constructor(
    public readonly key: string,
    reason: string,
  ) {
    super(`Invalid property key '${key}': ${reason}.`);
    this.name = "InvalidKeyPathError";
  }
}

const ARRAY_INDEX_REGEX = /^(0|[1-9][0-9]*)$/;

/**
 * Reads a mapping key starting at `start`. A key ends at the next `.`, `[`
 * or `]`, or at the end of the input.
 *
 * @return The key and the position of the first character after it.
 */
function readName(key: string, start: number): [string, number] {
  let end = start;
  while (end < key.length && !".[]".includes(key[end])) {
    end++;
  }
  return [key.slice(start, end), end];
}

/**
 * Reads a bracketed index whose `[` is at `start`.
 *
 * @return The index and the position of the first character after the `]`.
 */
function readIndex(key: string, start: number): [number, number] {
  const close = key.indexOf("]", start);
  if (close === -1) {
    throw new InvalidKeyPathError(
      key,
      `unterminated index at position ${start}`,
    );
  }

  const digits = key.slice(start + 1, close);
  if (!/^[0-9]+$/.test(digits)) {
    throw new InvalidKeyPathError(key, `'${digits}' is not an array index`);
  }

  const index = Number(digits);
  if (!Number.isSafeInteger(index)) {
    throw new InvalidKeyPathError(key, `index ${digits} is too large`);
  }

  return [index, close + 1];
}

/**
 * Parses a property key such as `versionControlProvenance[0].repositoryUri`
 * into its segments.
 */
export function parseKeyPath(key: string): KeyPath {
  if (key === "") {
    throw new InvalidKeyPathError(key, "the key is empty");
  }

  const segments: KeyPathSegment[] = [];
  let position = 0;

  if (key[0] !== "[") {
    const [name, next] = readName(key, 0);
    if (name === "") {
      throw new InvalidKeyPathError(key, "empty segment at position 0");
    }
    segments.push({ kind: KeyPathSegmentKind.Key, name });
    position = next;
  }

  while (position < key.length) {
    const char = key[position];
    if (char === ".") {
      const [name, next] = readName(key, position + 1);
      if (name === "") {
        throw new InvalidKeyPathError(
          key,
          `empty segment at position ${position + 1}`,
        );
      }
      segments.push({ kind: KeyPathSegmentKind.Key, name });
      position = next;
    } else if (char === "[") {
      const [index, next] = readIndex(key, position);
      segments.push({ kind: KeyPathSegmentKind.Index, index });
      position = next;
    } else {
      throw new InvalidKeyPathError(
        key,
        `unexpected '${char}' at position ${position}`,
      );
    }
  }

  return segments;
}

function escapePointerToken(token: string): string {
  return token.replace(/~/g, "~0").replace(/\//g, "~1");
}

function segmentToken(segment: KeyPathSegment): string {
  switch (segment.kind) {
    case KeyPathSegmentKind.Key:
      return segment.name;
    case KeyPathSegmentKind.Index:
      return segment.index.toString();
    default:
      assertNever(segment);
  }
}

/**
 * Converts a key path into a pointer, e.g. `foo.bar[0].baz` becomes `/foo/bar/0/baz`.
 */
export function keyPathToPointer(path: KeyPath): string {
  return path
    .map((segment) => `/${escapePointerToken(segmentToken(segment))}`)
    .join("");
}

function resolveSegment(
  value: PropertyValue,
  segment: KeyPathSegment,
): PropertyValue | undefined {
  if (Array.isArray(value)) {
    let index: number | undefined;
    if (segment.kind === KeyPathSegmentKind.Index) {
      index = segment.index;
    } else if (ARRAY_INDEX_REGEX.test(segment.name)) {
      index = Number(segment.name);
    }

    if (index === undefined || index >= value.length) {
      return undefined;
    }
    return value[index];
  }

  if (typeof value === "object" && value !== null) {
    const name = segmentToken(segment);
    return hasOwnProperty(value, name) ? value[name] : undefined;
  }

  return undefined;
}

/**
 * Looks up `path` in `document`.
 *
 * @return The value at the path, or `undefined` if some segment of the path does not exist.
 */
export function resolveKeyPath(
  document: PropertyValue,
  path: KeyPath,
): PropertyValue | undefined {
  let current: PropertyValue = document;
  for (const segment of path) {
    const next = resolveSegment(current, segment);
    if (next === undefined) {
      return undefined;
    }
    current = next;
  }
  return current;
}

/*
Purpose: format and parse the six-line header carried by every generated artifact.
Assumptions: the header starts on the first line; the comment leader is `#` or `//`.
Usage: formatHeader(fields, "//") + "\n" + payload; extractModuleDigest(text) for staleness checks.
*/

import type { UnitKind } from "./declarations.js";
import { isDigest } from "./digest.js";

// =============================================================================
// TYPES
// =============================================================================

export type CommentLeader = "#" | "//";

export type HeaderFields = {
  toolVersion: string;
  kind: UnitKind;
  sourceModule: string;
  /** Bare 64-char hex digest; a `sha256:` prefix is tolerated. */
  moduleDigest: string;
  specRefs: string[];
};

export type ParsedHeader = Partial<HeaderFields> & {
  comment: CommentLeader;
  /** Number of lines the header occupies. */
  lineCount: number;
};

export type SplitArtifact = {
  header: ParsedHeader;
  payload: string;
};

export const HEADER_MARKER = "This file was generated by jaunt. DO NOT EDIT.";
export const DIGEST_PREFIX = "sha256:";

const HEADER_FIELD_COUNT = 5;
const FIELD_LINE = /^(#|\/\/) jaunt:([a-z_]+)=(.*)$/;

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatHeader(fields: HeaderFields, comment: CommentLeader = "#"): string {
  return [
    `${comment} ${HEADER_MARKER}`,
    `${comment} jaunt:tool_version=${fields.toolVersion}`,
    `${comment} jaunt:kind=${fields.kind}`,
    `${comment} jaunt:source_module=${fields.sourceModule}`,
    `${comment} jaunt:module_digest=${DIGEST_PREFIX}${stripDigestPrefix(fields.moduleDigest)}`,
    `${comment} jaunt:spec_refs=${JSON.stringify(fields.specRefs)}`,
  ].join("\n");
}

export function formatArtifact(
  fields: HeaderFields,
  payload: string,
  comment: CommentLeader = "#",
): string {
  return `${formatHeader(fields, comment)}\n${payload.trimEnd()}\n`;
}

export function parseHeader(text: string): ParsedHeader | null {
  const lines = text.replace(/\r\n/g, "\n").split("\n");
  const comment = markerLeader(lines[0]);
  if (comment === null) return null;

  const header: ParsedHeader = { comment, lineCount: 1 };

  for (const line of lines.slice(1, 1 + HEADER_FIELD_COUNT)) {
    const match = FIELD_LINE.exec(line);
    if (!match) break;
    header.lineCount += 1;

    const key = match[2];
    const value = match[3] ?? "";
    switch (key) {
      case "tool_version":
        header.toolVersion = value;
        break;
      case "kind":
        if (value === "build" || value === "test") header.kind = value;
        break;
      case "source_module":
        header.sourceModule = value;
        break;
      case "module_digest":
        header.moduleDigest = stripDigestPrefix(value);
        break;
      case "spec_refs":
        header.specRefs = parseSpecRefs(value);
        break;
      default:
        break;
    }
  }

  return header;
}

/** The embedded module digest, or null when it is absent or malformed. */
export function extractModuleDigest(text: string): string | null {
  const digest = parseHeader(text)?.moduleDigest;
  if (digest === undefined || !isDigest(digest)) return null;
  return digest;
}

export function splitArtifact(text: string): SplitArtifact | null {
  const header = parseHeader(text);
  if (!header) return null;
  const payload = text.replace(/\r\n/g, "\n").split("\n").slice(header.lineCount).join("\n");
  return { header, payload };
}

export function hasJauntHeader(text: string): boolean {
  return parseHeader(text) !== null;
}

export function stripDigestPrefix(digest: string): string {
  return digest.startsWith(DIGEST_PREFIX) ? digest.slice(DIGEST_PREFIX.length) : digest;
}

// =============================================================================
// INTERNALS
// =============================================================================

function markerLeader(line: string | undefined): CommentLeader | null {
  if (line === `# ${HEADER_MARKER}`) return "#";
  if (line === `// ${HEADER_MARKER}`) return "//";
  return null;
}

function parseSpecRefs(value: string): string[] | undefined {
  try {
    const parsed: unknown = JSON.parse(value);
    if (Array.isArray(parsed) && parsed.every((item) => typeof item === "string")) {
      return parsed;
    }
    return undefined;
  } catch (err) {
    if (err instanceof SyntaxError) return undefined;
    throw err;
  }
}

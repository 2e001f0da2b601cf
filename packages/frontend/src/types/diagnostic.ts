/**
 * Diagnostic types for the lexicon compiler
 */

export type DiagnosticCode =
  | "LEX1001" // Input is not a directory
  | "LEX1002" // Unreadable file or invalid JSON
  | "LEX1003" // Malformed lexicon structure
  | "LEX1004" // Duplicate document id
  | "LEX2001" // Reference does not resolve
  | "LEX2002" // Definition kind not supported in this position
  | "LEX3001" // Two symbols allocate the same identifier
  | "LEX4001"; // Output could not be written

export type ErrorKind =
  | "InvalidInput"
  | "MalformedDocument"
  | "DuplicateDocument"
  | "UnresolvedReference"
  | "UnsupportedKind"
  | "NameCollision"
  | "WriteFailed";

const ERROR_KINDS: Readonly<Record<DiagnosticCode, ErrorKind>> = {
  LEX1001: "InvalidInput",
  LEX1002: "MalformedDocument",
  LEX1003: "MalformedDocument",
  LEX1004: "DuplicateDocument",
  LEX2001: "UnresolvedReference",
  LEX2002: "UnsupportedKind",
  LEX3001: "NameCollision",
  LEX4001: "WriteFailed",
};

/**
 * Where in the lexicon set a diagnostic points. `path` is the JSON path of
 * the offending node inside the document, e.g. `defs.main.record.properties.title`.
 */
export type DiagnosticLocation = {
  readonly file?: string;
  readonly nsid?: string;
  readonly def?: string;
  readonly path?: string;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly kind: ErrorKind;
  readonly message: string;
  readonly location?: DiagnosticLocation;
  readonly ref?: string;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  message: string,
  location?: DiagnosticLocation,
  extra: { readonly ref?: string; readonly hint?: string } = {}
): Diagnostic => ({
  code,
  kind: ERROR_KINDS[code],
  message,
  location,
  ref: extra.ref,
  hint: extra.hint,
});

const formatLocation = (location: DiagnosticLocation): string | undefined => {
  const symbol =
    location.nsid !== undefined
      ? location.def !== undefined
        ? `${location.nsid}#${location.def}`
        : location.nsid
      : undefined;
  const parts = [location.file, symbol, location.path].filter(
    (part): part is string => part !== undefined && part.length > 0
  );
  return parts.length > 0 ? parts.join(" ") : undefined;
};

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  const where = diagnostic.location
    ? formatLocation(diagnostic.location)
    : undefined;
  if (where) {
    parts.push(`${where}:`);
  }

  parts.push(`${diagnostic.kind} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};

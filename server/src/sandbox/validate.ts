/**
 * Query Validation
 *
 * Static checks that run before any connector call:
 * - strip comments and literals, then look for mutation keywords
 *   (read-only connectors) and stacked statements
 * - every supplied parameter must be bound through a placeholder
 * - a parameter value that shows up inside a literal (SQL) or as a path
 *   segment (HTTP) was interpolated, not bound
 */

import { UnsafeQueryError } from "../errors.js";
import type { QueryDialect, QueryParams } from "../connectors/types.js";

/** Statements that change data or schema. REPLACE only counts as "REPLACE INTO". */
export const MUTATION_KEYWORDS = new Set([
  "INSERT",
  "UPDATE",
  "DELETE",
  "DROP",
  "ALTER",
  "TRUNCATE",
  "CREATE",
  "GRANT",
  "REVOKE",
  "EXEC",
  "EXECUTE",
  "MERGE",
  "ATTACH",
  "DETACH",
  "PRAGMA",
  "VACUUM",
  "REINDEX",
]);

const HTTP_METHODS = new Set(["GET", "HEAD", "POST", "PUT", "PATCH", "DELETE"]);

export interface SqlAnalysis {
  /** Query text with literals replaced by '' and comments by a space */
  normalized: string;
  /** Contents of every quoted literal or quoted identifier */
  literals: string[];
  /** Named placeholders: @name, :name, $name */
  placeholders: Set<string>;
}

// ============================================
// SQL
// ============================================

export function analyzeSql(text: string): SqlAnalysis {
  const literals: string[] = [];
  let normalized = "";
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (ch === "-" && next === "-") {
      const end = text.indexOf("\n", i);
      i = end === -1 ? text.length : end;
      normalized += " ";
      continue;
    }

    if (ch === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      if (end === -1) throw new UnsafeQueryError("unterminated block comment");
      i = end + 2;
      normalized += " ";
      continue;
    }

    if (ch === "'" || ch === '"' || ch === "`") {
      let j = i + 1;
      let content = "";
      for (;;) {
        if (j >= text.length) throw new UnsafeQueryError("unterminated quoted literal");
        if (text[j] === ch) {
          // Doubled quote is an escaped quote.
          if (text[j + 1] === ch) {
            content += ch;
            j += 2;
            continue;
          }
          break;
        }
        content += text[j];
        j++;
      }
      literals.push(content);
      normalized += ch === "'" ? "''" : '""';
      i = j + 1;
      continue;
    }

    normalized += ch;
    i++;
  }

  const placeholders = new Set<string>();
  for (const match of normalized.matchAll(/(?<![:\w])[@:$]([A-Za-z_][A-Za-z0-9_]*)/g)) {
    placeholders.add(match[1]);
  }

  return { normalized, literals, placeholders };
}

function findMutation(normalized: string): string | null {
  const tokens = normalized.toUpperCase().match(/[A-Z_][A-Z0-9_]*/g) ?? [];
  for (let i = 0; i < tokens.length; i++) {
    if (MUTATION_KEYWORDS.has(tokens[i])) return tokens[i];
    if (tokens[i] === "REPLACE" && tokens[i + 1] === "INTO") return "REPLACE INTO";
  }
  return null;
}

function stripWildcards(literal: string): string {
  return literal.replace(/^%+|%+$/g, "");
}

export function validateSql(text: string, params: QueryParams, readOnly: boolean): SqlAnalysis {
  if (!text.trim()) throw new UnsafeQueryError("empty query");

  const analysis = analyzeSql(text);

  const separator = analysis.normalized.indexOf(";");
  if (separator !== -1 && analysis.normalized.slice(separator + 1).trim() !== "") {
    throw new UnsafeQueryError("multiple statements are not allowed");
  }

  if (readOnly) {
    const keyword = findMutation(analysis.normalized);
    if (keyword) throw new UnsafeQueryError(`"${keyword}" is not allowed on a read-only data source`);
  }

  for (const [name, value] of Object.entries(params)) {
    if (!analysis.placeholders.has(name)) {
      throw new UnsafeQueryError(`parameter "${name}" is not bound by a placeholder`);
    }
    if (typeof value === "string" && value.trim() !== "") {
      const needle = value.trim().toLowerCase();
      if (analysis.literals.some(lit => stripWildcards(lit).trim().toLowerCase() === needle)) {
        throw new UnsafeQueryError(`value of "${name}" is interpolated into the query text`);
      }
    }
  }

  return analysis;
}

// ============================================
// HTTP
// ============================================

export interface HttpRequestPlan {
  method: string;
  /** Path with {placeholders} still in place */
  pathTemplate: string;
  /** Placeholder names used in the path */
  pathParams: string[];
}

/** Query text for HTTP connectors: "[METHOD ]/path/{param}". */
export function validateHttp(text: string, params: QueryParams, readOnly: boolean): HttpRequestPlan {
  const trimmed = text.trim();
  if (!trimmed) throw new UnsafeQueryError("empty query");

  const parts = trimmed.split(/\s+/);
  if (parts.length > 2) throw new UnsafeQueryError("expected \"[METHOD] /path\"");

  const method = parts.length === 2 ? parts[0].toUpperCase() : "GET";
  const pathTemplate = parts.length === 2 ? parts[1] : parts[0];

  if (!HTTP_METHODS.has(method)) throw new UnsafeQueryError(`unsupported method "${method}"`);
  if (readOnly && method !== "GET") {
    throw new UnsafeQueryError(`"${method}" is not allowed on a read-only data source`);
  }
  if (!pathTemplate.startsWith("/") || pathTemplate.startsWith("//")) {
    throw new UnsafeQueryError("path must be relative to the connector base URL");
  }

  const pathParams = [...pathTemplate.matchAll(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g)].map(m => m[1]);
  for (const name of pathParams) {
    if (!(name in params)) throw new UnsafeQueryError(`path placeholder "{${name}}" has no parameter`);
  }

  const segments = pathTemplate
    .replace(/\{[A-Za-z_][A-Za-z0-9_]*\}/g, "")
    .split(/[/?&=]/)
    .map(s => safeDecode(s).trim().toLowerCase())
    .filter(Boolean);

  // Placeholder values are substituted by the connector; only unbound ones are checked.
  for (const [name, value] of Object.entries(params)) {
    if (pathParams.includes(name)) continue;
    if (typeof value === "string" && value.trim() !== "" && segments.includes(value.trim().toLowerCase())) {
      throw new UnsafeQueryError(`value of "${name}" is interpolated into the request path`);
    }
  }

  return { method, pathTemplate, pathParams };
}

function safeDecode(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/** Run the dialect's checks. Throws UnsafeQueryError on the first violation. */
export function validateQuery(dialect: QueryDialect, text: string, params: QueryParams, readOnly: boolean): void {
  if (dialect === "sql") validateSql(text, params, readOnly);
  else validateHttp(text, params, readOnly);
}

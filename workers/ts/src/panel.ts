import crypto from "node:crypto";
import path from "node:path";
import type { PanelSnapshot } from "./protocol.js";

const BOM = "\uFEFF";
const SLUG_PATTERN = /^[A-Za-z0-9_-]+$/;

export function stripBom(text: string): string {
  return text.startsWith(BOM) ? text.slice(BOM.length) : text;
}

export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  // A trailing newline terminates the last line rather than opening a new one.
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function endsWithLineBreak(text: string): boolean {
  return text.endsWith("\n") || text.endsWith("\r");
}

export function isComment(trimmed: string): boolean {
  return trimmed.startsWith("#");
}

/**
 * Parses panel text into metadata and genes.
 *
 * Leading `# key: value` lines form the metadata section, which ends at the
 * first comment without a colon or the first gene line. Blank lines never end it.
 */
export function parsePanel(text: string, slug: string): PanelSnapshot {
  const body = stripBom(text);
  const metadata = new Map<string, string>();
  const genes: string[] = [];
  let inMetadata = true;

  for (const raw of splitLines(body)) {
    const line = raw.trim();
    if (!line) continue;

    if (isComment(line)) {
      if (inMetadata) {
        const content = line.replace(/^#+/, "").trim();
        const colon = content.indexOf(":");
        if (colon >= 0) {
          metadata.set(content.slice(0, colon).trim(), content.slice(colon + 1).trim());
          continue;
        }
        inMetadata = false;
      }
      continue;
    }

    inMetadata = false;
    genes.push(line);
  }

  return Object.freeze({
    slug,
    metadata,
    genes: Object.freeze(genes),
    digest: hash(body),
  });
}

export function slugFromPath(p: string): string {
  return path.basename(p.replace(/\\/g, "/"), path.extname(p));
}

export function isValidSlug(slug: string): boolean {
  return SLUG_PATTERN.test(slug);
}

function hash(data: string): string {
  return crypto.createHash("sha256").update(data).digest("hex").slice(0, 16);
}

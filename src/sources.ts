import fs from "node:fs";
import { ConfigError } from "./errors.js";
import type { SourceItem } from "./types.js";
import { isHttpUrl } from "./utils.js";

export function parseSources(text: string): SourceItem[] {
  const items: SourceItem[] = [];
  const seen = new Set<string>();

  for (const raw of text.replace(/^\uFEFF/, "").split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || line.startsWith("#")) continue;

    const parsed = splitLine(line);
    if (!parsed || !isHttpUrl(parsed.url)) continue;
    if (seen.has(parsed.url)) continue;

    seen.add(parsed.url);
    items.push(parsed);
  }

  return items;
}

const URL_START = /^https?:\/\//i;

function splitLine(line: string): SourceItem | null {
  const tab = line.indexOf("\t");
  if (tab >= 0) {
    const [url = ""] = line.slice(tab + 1).trim().split(/\s+/);
    return { label: line.slice(0, tab).trim(), url };
  }

  // Label is everything before the first URL field; trailing notes are ignored
  const fields = line.split(/\s+/);
  const at = fields.findIndex((f) => URL_START.test(f));
  if (at < 0) return null;
  return { label: fields.slice(0, at).join(" "), url: fields[at] };
}

export function loadSources(path: string): SourceItem[] {
  if (!fs.existsSync(path)) {
    throw new ConfigError(`Source list not found: ${path}`);
  }
  return parseSources(fs.readFileSync(path, "utf8"));
}

import * as cheerio from "cheerio";
import { XMLParser } from "fast-xml-parser";
import { normalizeUrl } from "./utils.js";

export const DEFAULT_MAX_CHARS = 12000;
export const MIN_ANCHOR_TEXT = 6;
export const MIN_CJK_ANCHOR_TEXT = 4;
export const ENTRY_SEPARATOR = "\t";

export interface NormalizeOptions {
  /** Page URL, used to resolve relative links. */
  baseUrl?: string;
  maxChars?: number;
}

const FEED_CONTENT_TYPE = /(?:rss|atom|rdf)\+xml|^(?:application|text)\/xml\b/i;

export function looksLikeFeed(contentType: string, body: string): boolean {
  const mime = contentType.split(";")[0].trim();
  if (/html/i.test(mime)) return false;
  if (FEED_CONTENT_TYPE.test(mime)) return true;

  const head = body.replace(/^\uFEFF/, "").trimStart().slice(0, 512).toLowerCase();
  if (head.startsWith("<rss") || head.startsWith("<feed") || head.startsWith("<rdf:rdf")) return true;
  return head.startsWith("<?xml") && !/<html[\s>]/.test(head) && !head.includes("<!doctype html");
}

export function decodeBody(bytes: Buffer, contentType = ""): string {
  const label = charsetOf(contentType) ?? sniffCharset(bytes) ?? "utf-8";
  try {
    return new TextDecoder(label).decode(bytes);
  } catch {
    return new TextDecoder("utf-8").decode(bytes);
  }
}

function charsetOf(contentType: string): string | undefined {
  const match = /charset\s*=\s*["']?([\w.:-]+)/i.exec(contentType);
  return match?.[1];
}

function sniffCharset(bytes: Buffer): string | undefined {
  const head = bytes.subarray(0, 2048).toString("latin1");
  const meta = /<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i.exec(head);
  if (meta) return meta[1];
  const xml = /<\?xml[^>]+encoding\s*=\s*["']([\w.:-]+)["']/i.exec(head);
  return xml?.[1];
}

export function normalize(raw: Buffer | string, feed: boolean, options: NormalizeOptions = {}): string {
  const body = typeof raw === "string" ? raw : decodeBody(raw);
  const maxChars = options.maxChars ?? DEFAULT_MAX_CHARS;
  const text = feed ? normalizeFeed(body) : normalizeHtml(body, options.baseUrl);
  return text.slice(0, maxChars);
}

// ---------------------------------------------------------------------------
// Feeds

interface FeedEntry {
  title: string;
  link: string;
}

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  trimValues: true,
  processEntities: true,
});

function normalizeFeed(body: string): string {
  let entries: FeedEntry[] = [];
  try {
    entries = extractFeedEntries(xmlParser.parse(body));
  } catch {
    entries = [];
  }

  const lines = entries
    .map((e) => formatEntry(e.title, e.link))
    .filter((line) => line.trim().length > 0);
  if (lines.length === 0) return collapseWhitespace(body);
  return lines.join("\n");
}

function extractFeedEntries(doc: unknown): FeedEntry[] {
  const root = asRecord(doc);
  if (!root) return [];

  const rss = asRecord(root["rss"]);
  const channel = asRecord(rss?.["channel"]);
  if (channel) return toArray(channel["item"]).map(rssEntry);

  const rdf = asRecord(root["rdf:RDF"]);
  if (rdf) return toArray(rdf["item"]).map(rssEntry);

  const atom = asRecord(root["feed"]);
  if (atom) return toArray(atom["entry"]).map(atomEntry);

  return [];
}

function rssEntry(node: unknown): FeedEntry {
  const item = asRecord(node) ?? {};
  return { title: textOf(item["title"]), link: textOf(item["link"]) || textOf(item["guid"]) };
}

function atomEntry(node: unknown): FeedEntry {
  const entry = asRecord(node) ?? {};
  const links = toArray(entry["link"]).filter(isRecord);
  const preferred =
    links.find((l) => l["@_rel"] === undefined || l["@_rel"] === "alternate") ?? links[0];
  const href = preferred ? textOf(preferred["@_href"]) : "";
  return { title: textOf(entry["title"]), link: href || textOf(entry["id"]) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown): Record<string, unknown> | null {
  return isRecord(value) ? value : null;
}

function toArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  const record = asRecord(value);
  if (record && "#text" in record) return textOf(record["#text"]);
  return "";
}

// ---------------------------------------------------------------------------
// Pages

const NON_CONTENT = "script, style, noscript, template";
const BLOCK_ELEMENTS =
  "p, div, li, ul, ol, tr, table, section, article, header, footer, nav, aside, main, h1, h2, h3, h4, h5, h6, dt, dd, blockquote, pre";

function normalizeHtml(html: string, baseUrl?: string): string {
  const $ = cheerio.load(html);
  $(NON_CONTENT).remove();

  const declaredBase = $("base[href]").first().attr("href");
  const base = declaredBase ? normalizeUrl(declaredBase, baseUrl) : baseUrl;
  const lines = extractLinks($, base);
  if (lines.length > 0) return lines.join("\n");
  return visibleText($);
}

function extractLinks($: cheerio.CheerioAPI, baseUrl?: string): string[] {
  const lines: string[] = [];
  const seen = new Set<string>();

  $("a[href]").each((_, el) => {
    const href = ($(el).attr("href") ?? "").trim();
    if (!isContentHref(href)) return;

    const title = collapseLine($(el).text());
    if (!isMeaningfulTitle(title)) return;

    const line = formatEntry(title, normalizeUrl(href, baseUrl));
    if (seen.has(line)) return;
    seen.add(line);
    lines.push(line);
  });

  return lines;
}

const CJK = /[\u3040-\u30ff\u3400-\u4dbf\u4e00-\u9fff\uf900-\ufaff\uac00-\ud7af]/;

// Measured in code points
function isMeaningfulTitle(title: string): boolean {
  const min = CJK.test(title) ? MIN_CJK_ANCHOR_TEXT : MIN_ANCHOR_TEXT;
  return [...title].length >= min;
}

function isContentHref(href: string): boolean {
  if (!href || href.startsWith("#")) return false;
  return !/^(javascript|mailto|tel):/i.test(href);
}

function visibleText($: cheerio.CheerioAPI): string {
  $("br").replaceWith("\n");
  $(BLOCK_ELEMENTS).each((_, el) => {
    $(el).prepend("\n").append("\n");
  });
  const text = $("body").length > 0 ? $("body").text() : $.root().text();
  return collapseWhitespace(text);
}

// ---------------------------------------------------------------------------
// Text helpers

function formatEntry(title: string, link: string): string {
  return `${collapseLine(title)}${ENTRY_SEPARATOR}${link.trim()}`;
}

function collapseLine(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function collapseWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, "\n")
    .split("\n")
    .map((line) => line.replace(/[^\S\n]+/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

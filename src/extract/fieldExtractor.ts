import * as cheerio from "cheerio";
import { isTag } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import { errorMessage } from "../errors";
import { Logger, silentLogger } from "../logging/logger";
import { UNKNOWN } from "../types/taxpayerRecord";
import { normalizeWhitespace } from "../utils/text";
import { ScalarFieldDescriptor, SectionDescriptor } from "./descriptors";

type Node$ = cheerio.Cheerio<AnyNode>;

const SKIPPED_TAGS = new Set(["script", "style", "noscript", "template", "head", "title"]);
const HEADING_TAGS = new Set(["h1", "h2", "h3", "h4", "h5", "h6"]);
const MAX_SECTION_ASCENT = 3;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive match of a phrase that does not start or end inside a word. */
function phrasePattern(phrase: string): RegExp {
  return new RegExp(`(?:^|[^a-z0-9])(${escapeRegExp(phrase)})(?![a-z0-9])`, "i");
}

/** Drops separators left between a label and its value. */
function stripSeparators(text: string): string {
  return text.replace(/^[\s:\-–—|]+/, "").replace(/[\s:|]+$/, "").trim();
}

function textOf(node: Node$): string {
  return normalizeWhitespace(node.text());
}

function tagName(node: AnyNode): string {
  return isTag(node) ? node.tagName.toLowerCase() : "";
}

function isSkipped($el: Node$): boolean {
  return $el
    .parents()
    .addBack()
    .toArray()
    .some((node) => SKIPPED_TAGS.has(tagName(node)));
}

function attempt<T>(logger: Logger, strategy: string, key: string, run: () => T | null): T | null {
  try {
    return run();
  } catch (error) {
    logger.debug(`${strategy} lookup failed for ${key}`, { error: errorMessage(error) });
    return null;
  }
}

/**
 * Deepest elements whose text contains the phrase, in document order.
 * An element is skipped when one of its children also contains the phrase.
 */
export function findPhraseElements($: cheerio.CheerioAPI, phrase: string): Element[] {
  const pattern = phrasePattern(phrase);
  const matches: Element[] = [];

  $("body")
    .find("*")
    .each((_, el) => {
      const $el = $(el);
      if (SKIPPED_TAGS.has(el.tagName.toLowerCase())) return;
      if (!pattern.test(textOf($el))) return;
      const childMatches = $el
        .children()
        .toArray()
        .some((child) => pattern.test(textOf($(child))));
      if (childMatches || isSkipped($el)) return;
      matches.push(el);
    });

  return matches;
}

/** Text following the phrase within the given text, separators removed. */
function textAfterPhrase(text: string, phrase: string): string {
  const match = phrasePattern(phrase).exec(text);
  if (!match || match.index === undefined) return "";
  const start = match.index + match[0].length;
  return stripSeparators(text.slice(start));
}

function anchorLookup($: cheerio.CheerioAPI, anchors: readonly string[]): string | null {
  for (const anchor of anchors) {
    const candidates = $(`[id="${anchor}"], [class~="${anchor}"]`).toArray();
    for (const candidate of candidates) {
      const $el = $(candidate);
      const value = tagName(candidate) === "input" ? normalizeWhitespace($el.attr("value") ?? "") : textOf($el);
      if (value) return value;
    }
  }
  return null;
}

/** For a header cell, the cell in the same column of the following row. */
function columnValue($: cheerio.CheerioAPI, $cell: Node$): string {
  const index = $cell.index();
  const row = $cell.closest("tr");
  let nextRow = row.next("tr");
  if (!nextRow.length) {
    nextRow = row.parent().next().find("tr").first();
  }
  if (!nextRow.length || index < 0) return "";
  const cell = nextRow.children("td,th").eq(index);
  return cell.length ? textOf(cell) : "";
}

function valueNearLabel($: cheerio.CheerioAPI, el: Element, label: string): string {
  const $el = $(el);

  const inline = textAfterPhrase(textOf($el), label);
  if (inline) return inline;

  const sibling = $el.next();
  const siblingIsHeader = sibling.length > 0 && tagName(sibling[0]) === "th";

  if (tagName(el) === "th" && (siblingIsHeader || !sibling.length)) {
    const below = columnValue($, $el);
    if (below) return below;
  }

  if (sibling.length && !siblingIsHeader) {
    const siblingText = textOf(sibling);
    if (siblingText) return siblingText;
  }

  const container = $el.parent();
  if (container.length && tagName(container[0]) !== "body") {
    return textAfterPhrase(textOf(container), label);
  }
  return "";
}

function labelLookup($: cheerio.CheerioAPI, labels: readonly string[]): string | null {
  for (const label of labels) {
    for (const el of findPhraseElements($, label)) {
      const value = valueNearLabel($, el, label);
      if (value) return value;
    }
  }
  return null;
}

export function extractScalar(
  $: cheerio.CheerioAPI,
  descriptor: ScalarFieldDescriptor,
  logger: Logger = silentLogger
): string {
  const byAnchor = attempt(logger, "anchor", descriptor.key, () => anchorLookup($, descriptor.anchors));
  if (byAnchor) return byAnchor;

  const byLabel = attempt(logger, "label", descriptor.key, () => labelLookup($, descriptor.labels));
  if (byLabel) return byLabel;

  return UNKNOWN;
}

function tableAfter($: cheerio.CheerioAPI, el: Element): Node$ | null {
  const $el = $(el);
  const own = $el.closest("caption, thead, th");
  if (own.length) {
    const table = own.closest("table");
    if (table.length) return table;
  }

  let node: Node$ = $el;
  for (let depth = 0; depth <= MAX_SECTION_ASCENT; depth += 1) {
    for (const sibling of node.nextAll().toArray()) {
      const tag = tagName(sibling);
      if (tag === "table") return $(sibling);
      if (HEADING_TAGS.has(tag)) return null;
      const inner = $(sibling).find("table").first();
      if (inner.length) return inner;
    }
    node = node.parent();
    if (!node.length || tagName(node[0]) === "body") break;
  }
  return null;
}

function cellTexts($: cheerio.CheerioAPI, row: AnyNode): string[] {
  return $(row)
    .children("td,th")
    .toArray()
    .map((cell) => textOf($(cell)));
}

function columnMapping(headers: string[], columns: readonly (readonly string[])[]): number[] {
  const mapping = columns.map((synonyms) =>
    headers.findIndex((header) => synonyms.some((synonym) => phrasePattern(synonym).test(header)))
  );
  return mapping.some((index) => index >= 0) ? mapping : columns.map((_, index) => index);
}

export function readTableRows<Row>(
  $: cheerio.CheerioAPI,
  table: Node$,
  descriptor: SectionDescriptor<Row>
): Row[] {
  const rows = table.find("tr").toArray();
  const headerRows = rows.filter(
    (row) => $(row).closest("thead").length > 0 || $(row).children("td").length === 0
  );
  const hasHeader = headerRows.length > 0;
  const dataRows = hasHeader ? rows.filter((row) => !headerRows.includes(row)) : rows.slice(1);
  const headerCells = hasHeader ? cellTexts($, headerRows[headerRows.length - 1]) : [];
  const mapping = hasHeader
    ? columnMapping(headerCells, descriptor.columns)
    : descriptor.columns.map((_, index) => index);

  const out: Row[] = [];
  for (const row of dataRows) {
    const cells = cellTexts($, row);
    if (cells.every((cell) => !cell)) continue;
    const values = mapping.map((index) => (index >= 0 && cells[index] ? cells[index] : UNKNOWN));
    out.push(descriptor.toRow(values));
  }
  return out;
}

function sectionLookup<Row>($: cheerio.CheerioAPI, descriptor: SectionDescriptor<Row>): Row[] | null {
  for (const marker of descriptor.markers) {
    for (const el of findPhraseElements($, marker)) {
      if ($(el).closest("td").length) continue;
      const table = tableAfter($, el);
      if (!table) continue;
      const rows = readTableRows($, table, descriptor);
      if (rows.length) return rows;
    }
  }
  return null;
}

export function extractSection<Row>(
  $: cheerio.CheerioAPI,
  descriptor: SectionDescriptor<Row>,
  logger: Logger = silentLogger
): Row[] {
  return attempt(logger, "section", descriptor.key, () => sectionLookup($, descriptor)) ?? [];
}

export function extractField($: cheerio.CheerioAPI, descriptor: ScalarFieldDescriptor, logger?: Logger): string;
export function extractField<Row>(
  $: cheerio.CheerioAPI,
  descriptor: SectionDescriptor<Row>,
  logger?: Logger
): Row[];
export function extractField<Row>(
  $: cheerio.CheerioAPI,
  descriptor: ScalarFieldDescriptor | SectionDescriptor<Row>,
  logger: Logger = silentLogger
): string | Row[] {
  return descriptor.kind === "scalar"
    ? extractScalar($, descriptor, logger)
    : extractSection($, descriptor, logger);
}

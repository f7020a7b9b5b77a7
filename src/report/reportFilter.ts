import * as cheerio from "cheerio";
import type { Element } from "domhandler";
import { normalizeWhitespace } from "../utils/text";

export type ReportDocument = cheerio.CheerioAPI;

export class ReportParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReportParseError";
  }
}

export interface ReportFilterOptions {
  /** Tag of the nodes to test, wherever they sit in the tree. */
  nodeTag: string;
  /** Child element (or attribute) whose text is handed to `matches`. */
  selectorField: string;
  matches: (value: string) => boolean;
  rootTag: string;
}

export interface ReportFilterResult {
  document: ReportDocument;
  count: number;
  xml: string;
}

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

export function loadReport(xml: string): ReportDocument {
  if (!xml.trim()) {
    throw new ReportParseError("Report document is empty");
  }
  const report = cheerio.load(xml, { xml: true });
  if (report.root().children().length === 0) {
    throw new ReportParseError("Report document has no root element");
  }
  return report;
}

export function equalsIgnoreCase(expected: string): (value: string) => boolean {
  const target = expected.trim().toLowerCase();
  return (value) => value.trim().toLowerCase() === target;
}

export function selectorValue(report: ReportDocument, node: Element, field: string): string | null {
  const child = report(node).children(field).first();
  if (child.length > 0) {
    return normalizeWhitespace(child.text());
  }
  const attr = report(node).attr(field);
  return attr === undefined ? null : attr.trim();
}

/**
 * Copies every `nodeTag` node whose selector field satisfies `matches` into a new document,
 * full subtree included, in document order. A match inside another match is not copied twice.
 * No matches yields an empty root element.
 */
export function extractMatching(report: ReportDocument, options: ReportFilterOptions): ReportFilterResult {
  const candidates = report<Element, string>(options.nodeTag)
    .toArray()
    .filter((node) => {
      const value = selectorValue(report, node, options.selectorField);
      return value !== null && options.matches(value);
    });
  // A match nested in another match is already copied with its ancestor's subtree.
  const selected = new Set(candidates);
  const matched = candidates.filter(
    (node) => !report(node)
      .parents(options.nodeTag)
      .toArray()
      .some((ancestor) => selected.has(ancestor))
  );

  const document = cheerio.load(`${XML_DECLARATION}<${options.rootTag}></${options.rootTag}>`, { xml: true });
  const root = document(options.rootTag).first();
  for (const node of matched) {
    root.append(report.xml(node));
  }

  return { document, count: matched.length, xml: document.xml() };
}

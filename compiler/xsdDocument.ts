// ─────────────────────────────────────────────────────────────
// XSD Document — Schema documents as a plain element tree
// ─────────────────────────────────────────────────────────────

import fs from "fs";
import path from "path";
import * as cheerio from "cheerio";
import { isTag } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import { SchemaCompileFailure } from "../schema/errors";
import { XSD_NAMESPACE } from "../schema/reportFormat";

export interface XsdElement {
  /** Local name: "complexType", "element", ... */
  readonly tag: string;
  /** Namespace prefix as written, "" when unprefixed */
  readonly prefix: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly XsdElement[];
}

export interface XsdDocument {
  readonly fileName: string;
  /** Absent for documents parsed from a string */
  readonly filePath?: string;
  readonly root: XsdElement;
  /** Prefix → namespace URI declared on the root ("" for the default) */
  readonly namespaces: ReadonlyMap<string, string>;
}

/**
 * Parse schema text. The root element must be `schema` in the XML
 * Schema namespace.
 */
export function parseXsdDocument(xml: string, fileName: string, filePath?: string): XsdDocument {
  const $ = cheerio.load(xml, { xml: true });
  const top = $.root().children().toArray().filter(isTag);

  if (top.length !== 1) {
    throw new SchemaCompileFailure(fileName, `expected a single root element, found ${top.length}`);
  }

  const root = toXsdElement(top[0]);
  const namespaces = new Map<string, string>();
  for (const [name, value] of Object.entries(root.attributes)) {
    if (name === "xmlns") namespaces.set("", value);
    else if (name.startsWith("xmlns:")) namespaces.set(name.slice("xmlns:".length), value);
  }

  if (root.tag !== "schema" || namespaces.get(root.prefix) !== XSD_NAMESPACE) {
    throw new SchemaCompileFailure(fileName, `root element is not an XML Schema document`);
  }

  return { fileName, filePath, root, namespaces };
}

export function loadXsdDocument(filePath: string): XsdDocument {
  const fileName = path.basename(filePath);
  if (!fs.existsSync(filePath)) {
    throw new SchemaCompileFailure(fileName, `file not found: ${filePath}`);
  }
  return parseXsdDocument(fs.readFileSync(filePath, "utf-8"), fileName, filePath);
}

// ── Tree helpers ─────────────────────────────────────────

export function childrenByTag(element: XsdElement, tag: string): XsdElement[] {
  return element.children.filter((child) => child.tag === tag);
}

export function firstChildByTag(element: XsdElement, tag: string): XsdElement | undefined {
  return element.children.find((child) => child.tag === tag);
}

/** Depth-first search below (not including) `element` */
export function findDescendants(element: XsdElement, tag: string): XsdElement[] {
  const found: XsdElement[] = [];
  const walk = (node: XsdElement) => {
    for (const child of node.children) {
      if (child.tag === tag) found.push(child);
      walk(child);
    }
  };
  walk(element);
  return found;
}

/** "dsrf:RecordType-SU02" → { prefix: "dsrf", local: "RecordType-SU02" } */
export function splitQName(qname: string): { prefix: string; local: string } {
  const colon = qname.indexOf(":");
  return colon < 0
    ? { prefix: "", local: qname }
    : { prefix: qname.slice(0, colon), local: qname.slice(colon + 1) };
}

function toXsdElement(node: Element): XsdElement {
  const { prefix, local } = splitQName(node.name);
  return {
    tag: local,
    prefix,
    attributes: { ...node.attribs },
    children: node.children.filter((child: AnyNode): child is Element => isTag(child)).map(toXsdElement),
  };
}

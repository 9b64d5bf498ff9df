import { XMLParser, XMLValidator } from "fast-xml-parser";

import { type Result, err, ok } from "~shared/utils/Result";

export const XmpNamespace = {
  rdf: "http://www.w3.org/1999/02/22-rdf-syntax-ns#",
  dc: "http://purl.org/dc/elements/1.1/",
  Iptc4xmpCore: "http://iptc.org/std/Iptc4xmpCore/1.0/xmlns/",
  photoshop: "http://ns.adobe.com/photoshop/1.0/",
  exif: "http://ns.adobe.com/exif/1.0/",
  lr: "http://ns.adobe.com/lightroom/1.0/",
  xmp: "http://ns.adobe.com/xap/1.0/",
  xml: "http://www.w3.org/XML/1998/namespace",
} as const;

export type XmlAttribute = { ns: string; local: string; value: string };

/** 已解析命名空間的 XML 元素 */
export type XmlElement = {
  ns: string;
  local: string;
  attributes: XmlAttribute[];
  children: XmlElement[];
  text: string;
};

type Scope = ReadonlyMap<string, string>;

const ATTR_PREFIX = "@_";
const ATTRS_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  // 數字字元參照（Lightroom 以 &#xA; 表示換行）
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function splitName(name: string): { prefix?: string; local: string } {
  const index = name.indexOf(":");
  if (index < 0) return { local: name };
  return { prefix: name.slice(0, index), local: name.slice(index + 1) };
}

function readAttributes(node: Record<string, unknown>): Record<string, string> {
  const raw = node[ATTRS_KEY];
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTR_PREFIX)) continue;
    attributes[key.slice(ATTR_PREFIX.length)] = String(value);
  }
  return attributes;
}

function extendScope(scope: Scope, attributes: Record<string, string>): Scope {
  let next: Map<string, string> | undefined;
  for (const [name, value] of Object.entries(attributes)) {
    if (name === "xmlns" || name.startsWith("xmlns:")) {
      next ??= new Map(scope);
      next.set(name === "xmlns" ? "" : name.slice("xmlns:".length), value);
    }
  }
  return next ?? scope;
}

function convertNodes(nodes: unknown, scope: Scope): XmlElement[] {
  if (!Array.isArray(nodes)) return [];
  const elements: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const tagName = Object.keys(node).find(
      (key) => key !== ATTRS_KEY && key !== TEXT_KEY
    );
    if (tagName === undefined) continue;
    elements.push(convertElement(tagName, node, scope));
  }
  return elements;
}

function convertElement(
  tagName: string,
  node: Record<string, unknown>,
  parentScope: Scope
): XmlElement {
  const rawAttributes = readAttributes(node);
  const scope = extendScope(parentScope, rawAttributes);
  const { prefix, local } = splitName(tagName);

  const attributes: XmlAttribute[] = [];
  for (const [name, value] of Object.entries(rawAttributes)) {
    if (name === "xmlns" || name.startsWith("xmlns:")) continue;
    const attr = splitName(name);
    attributes.push({
      ns: attr.prefix === undefined ? "" : (scope.get(attr.prefix) ?? ""),
      local: attr.local,
      value,
    });
  }

  const content = node[tagName];
  let text = "";
  if (Array.isArray(content)) {
    for (const child of content) {
      if (isRecord(child) && TEXT_KEY in child) text += String(child[TEXT_KEY]);
    }
  }

  return {
    ns: scope.get(prefix ?? "") ?? "",
    local,
    attributes,
    children: convertNodes(content, scope),
    text: text.trim(),
  };
}

/**
 * 解析 XMP 文件為命名空間樹。根節點為虛擬元素，子節點為文件最外層元素。
 */
export function parseXmp(xml: string): Result<XmlElement, string> {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    return err(`${msg} (line ${line})`);
  }
  try {
    const scope: Scope = new Map([["xml", XmpNamespace.xml]]);
    const children = convertNodes(parser.parse(xml), scope);
    if (children.length === 0) return err("文件沒有任何元素");
    return ok({ ns: "", local: "#document", attributes: [], children, text: "" });
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error));
  }
}

export function childElements(
  element: XmlElement,
  ns: string,
  local: string
): XmlElement[] {
  return element.children.filter((c) => c.ns === ns && c.local === local);
}

export function descendants(
  element: XmlElement,
  ns: string,
  local: string
): XmlElement[] {
  const found: XmlElement[] = [];
  const visit = (node: XmlElement) => {
    for (const child of node.children) {
      if (child.ns === ns && child.local === local) found.push(child);
      visit(child);
    }
  };
  visit(element);
  return found;
}

export function attributeOf(
  element: XmlElement,
  ns: string,
  local: string
): string | undefined {
  return element.attributes.find((a) => a.ns === ns && a.local === local)
    ?.value;
}

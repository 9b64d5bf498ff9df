import { readFile } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type { GpsFields, LocationFields } from "@/types";
import { normalizeDate } from "@/utils/DateNormalizer";

import {
  type SidecarMetadata,
  type SidecarReader,
  emptySidecarMetadata,
} from "./SidecarReader";
import {
  type XmlElement,
  XmpNamespace as NS,
  attributeOf,
  childElements,
  descendants,
  parseXmp,
} from "./XmpDocument";

type Strategy<T> = (root: XmlElement) => T | undefined;

const X_DEFAULT = "x-default";

/** 依序嘗試，回傳第一個有值的結果 */
function firstOf<T>(root: XmlElement, strategies: Strategy<T>[]): T | undefined {
  for (const strategy of strategies) {
    const value = strategy(root);
    if (value !== undefined) return value;
  }
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function langOf(li: XmlElement) {
  return attributeOf(li, NS.xml, "lang");
}

/** `<prop>/<container>/rdf:li` 的項目 */
function listItems(
  root: XmlElement,
  ns: string,
  prop: string,
  container: "Alt" | "Bag" | "Seq"
): XmlElement[] {
  return descendants(root, ns, prop)
    .flatMap((p) => childElements(p, NS.rdf, container))
    .flatMap((c) => childElements(c, NS.rdf, "li"));
}

/** 直接位於 `<prop>` 下的 rdf:li */
function directItems(root: XmlElement, ns: string, prop: string): XmlElement[] {
  return descendants(root, ns, prop).flatMap((p) =>
    childElements(p, NS.rdf, "li")
  );
}

function pickText(
  items: XmlElement[],
  filter: (li: XmlElement) => boolean
): string | undefined {
  for (const li of items) {
    if (!filter(li)) continue;
    const text = nonEmpty(li.text);
    if (text) return text;
  }
  return undefined;
}

const isDefaultLang = (li: XmlElement) => langOf(li) === X_DEFAULT;
const isUntagged = (li: XmlElement) => langOf(li) === undefined;
const anyLang = () => true;

/**
 * 屬性或元素形式的單值欄位：先找 rdf:Description 上的屬性，再找元素文字。
 */
function simpleValue(root: XmlElement, ns: string, local: string) {
  for (const desc of descendants(root, NS.rdf, "Description")) {
    const value = nonEmpty(attributeOf(desc, ns, local));
    if (value) return value;
  }
  for (const el of descendants(root, ns, local)) {
    const value = nonEmpty(el.text);
    if (value) return value;
  }
  return undefined;
}

const titleStrategies: Strategy<string>[] = [
  (root) => pickText(listItems(root, NS.dc, "title", "Alt"), isDefaultLang),
  (root) => pickText(listItems(root, NS.dc, "title", "Alt"), isUntagged),
  (root) => pickText(listItems(root, NS.dc, "title", "Alt"), anyLang),
  (root) => pickText(directItems(root, NS.dc, "title"), isDefaultLang),
  (root) => pickText(directItems(root, NS.dc, "title"), anyLang),
  (root) => simpleValue(root, NS.photoshop, "Headline"),
  (root) => simpleValue(root, NS.Iptc4xmpCore, "Location"),
];

function splitKeywords(values: string[], separator?: string): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    const parts = separator ? value.split(separator) : [value];
    for (const part of parts) {
      const keyword = part.trim();
      if (keyword) seen.add(keyword);
    }
  }
  return [...seen];
}

const keywordStrategies: Strategy<string[]>[] = [
  (root) => {
    const items = listItems(root, NS.lr, "hierarchicalSubject", "Bag");
    const keywords = splitKeywords(items.map((li) => li.text), "|");
    return keywords.length > 0 ? keywords : undefined;
  },
  (root) => {
    const keywords = splitKeywords(
      listItems(root, NS.dc, "subject", "Bag").map((li) => li.text)
    );
    return keywords.length > 0 ? keywords : undefined;
  },
  (root) => {
    const keywords = splitKeywords(
      listItems(root, NS.dc, "subject", "Seq").map((li) => li.text)
    );
    return keywords.length > 0 ? keywords : undefined;
  },
];

const captionStrategies: Strategy<string>[] = [
  (root) => pickText(listItems(root, NS.dc, "description", "Alt"), isDefaultLang),
  (root) => pickText(listItems(root, NS.dc, "description", "Alt"), anyLang),
];

const locationStrategies: Strategy<LocationFields>[] = [
  (root) => {
    const location = simpleValue(root, NS.Iptc4xmpCore, "Location");
    const city = simpleValue(root, NS.Iptc4xmpCore, "City");
    const country = simpleValue(root, NS.Iptc4xmpCore, "CountryName");
    if (!location && !city && !country) return undefined;
    return { location, city, country };
  },
  (root) => {
    const city = simpleValue(root, NS.photoshop, "City");
    const state = simpleValue(root, NS.photoshop, "State");
    const country = simpleValue(root, NS.photoshop, "Country");
    if (!city && !state && !country) return undefined;
    return { city, state, country };
  },
];

const dateStrategies: Strategy<string>[] = [
  (root) => normalizeDate(simpleValue(root, NS.exif, "DateTimeOriginal")),
  (root) => normalizeDate(simpleValue(root, NS.photoshop, "DateCreated")),
  (root) => normalizeDate(simpleValue(root, NS.xmp, "CreateDate")),
];

function readGps(root: XmlElement): GpsFields | undefined {
  const latitude = simpleValue(root, NS.exif, "GPSLatitude");
  const longitude = simpleValue(root, NS.exif, "GPSLongitude");
  if (!latitude || !longitude) return undefined;
  const altitude = simpleValue(root, NS.exif, "GPSAltitude");
  return altitude ? { latitude, longitude, altitude } : { latitude, longitude };
}

/** 從 XMP 樹取出所有欄位 */
export function extractSidecarMetadata(root: XmlElement): SidecarMetadata {
  const metadata: SidecarMetadata = {
    keywords: firstOf(root, keywordStrategies) ?? [],
    location: firstOf(root, locationStrategies) ?? {},
  };
  const title = firstOf(root, titleStrategies);
  if (title) metadata.title = title;
  const caption = firstOf(root, captionStrategies);
  if (caption) metadata.caption = caption;
  const date = firstOf(root, dateStrategies);
  if (date) metadata.date = date;
  const gps = readGps(root);
  if (gps) metadata.gps = gps;
  return metadata;
}

function isNotFound(error: unknown) {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

export class SidecarReaderXmp implements SidecarReader {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("SidecarReaderXmp");
  }

  async read(sidecarPath: string): Promise<SidecarMetadata> {
    let xml: string;
    try {
      xml = await readFile(sidecarPath, "utf8");
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.error({ error, sidecarPath })`讀取 sidecar 失敗`;
      }
      return emptySidecarMetadata();
    }
    return this.parse(xml, sidecarPath);
  }

  /** 解析 XMP 內容，失敗時記錄錯誤並回傳空結果 */
  parse(xml: string, source = "<inline>"): SidecarMetadata {
    const doc = parseXmp(xml);
    if (isErr(doc)) {
      this.logger.error({ source, reason: doc.error })`sidecar 解析失敗`;
      return emptySidecarMetadata();
    }
    const metadata = extractSidecarMetadata(doc.value);
    this.logger.debug({ source })`已讀取 sidecar，關鍵字 ${metadata.keywords.length} 個`;
    return metadata;
  }
}

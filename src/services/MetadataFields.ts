import path from "node:path";

import { videoExtensions } from "@/constants";
import { isListTag } from "@/services/ExifService";
import type { GpsFields, MediaKind, MediaMetadata, WriteFields } from "@/types";

export type FieldKind =
  | "title"
  | "date"
  | "keywords"
  | "caption"
  | "location"
  | "city"
  | "state"
  | "country";

export type TagTable = Record<FieldKind, readonly string[]>;

/** 相片寫入欄位；標題同時寫入四個標籤 */
export const photoTagTable: TagTable = {
  title: ["XMP-dc:Title", "IPTC:ObjectName", "IPTC:Headline", "EXIF:XPTitle"],
  date: [
    "EXIF:DateTimeOriginal",
    "EXIF:CreateDate",
    "XMP-exif:DateTimeOriginal",
    "XMP-photoshop:DateCreated",
  ],
  keywords: ["XMP-dc:Subject", "IPTC:Keywords"],
  caption: ["XMP-dc:Description", "IPTC:Caption-Abstract", "EXIF:ImageDescription"],
  location: ["XMP-iptcCore:Location", "IPTC:Sub-location"],
  city: ["XMP-photoshop:City", "IPTC:City"],
  state: ["XMP-photoshop:State", "IPTC:Province-State"],
  country: ["XMP-photoshop:Country", "IPTC:Country-PrimaryLocationName"],
};

/** 影片寫入欄位，以 Apple Photos 能讀到的標籤為主 */
export const videoTagTable: TagTable = {
  title: ["XMP:Title", "QuickTime:Title", "ItemList:Title", "XMP-dc:Title"],
  date: [
    "QuickTime:CreateDate",
    "QuickTime:MediaCreateDate",
    "XMP:CreateDate",
    "XMP:DateTimeOriginal",
  ],
  keywords: ["QuickTime:Keywords", "XMP:Subject"],
  caption: ["QuickTime:Description", "XMP:Description", "ItemList:Description"],
  location: ["XMP:Location", "QuickTime:LocationName"],
  city: ["XMP:City"],
  state: ["XMP:State"],
  country: ["XMP:Country"],
};

/** 讀取內嵌標籤時的候選，依序取第一個有值者 */
export const embeddedSourceTable: Record<FieldKind | "rating", readonly string[]> = {
  title: ["XMP:Title", "IPTC:ObjectName", "QuickTime:Title", "ItemList:Title", "IPTC:Headline"],
  date: [
    "EXIF:DateTimeOriginal",
    "XMP:DateTimeOriginal",
    "QuickTime:CreateDate",
    "XMP:CreateDate",
    "EXIF:CreateDate",
    "XMP:DateCreated",
  ],
  keywords: ["XMP:Subject", "IPTC:Keywords", "QuickTime:Keywords"],
  caption: ["XMP:Description", "IPTC:Caption-Abstract", "QuickTime:Description", "EXIF:ImageDescription"],
  location: ["XMP:Location", "IPTC:Sub-location", "QuickTime:LocationName"],
  city: ["XMP:City", "IPTC:City"],
  state: ["XMP:State", "IPTC:Province-State"],
  country: ["XMP:Country", "IPTC:Country-PrimaryLocationName"],
  rating: ["XMP:Rating", "EXIF:Rating"],
};

export function mediaKindOf(filePath: string): MediaKind {
  const ext = path.extname(filePath).toLowerCase();
  return videoExtensions.some((v) => v === ext) ? "video" : "photo";
}

export function tagTableOf(kind: MediaKind): TagTable {
  return kind === "video" ? videoTagTable : photoTagTable;
}

function toDms(value: string): string | undefined {
  const m = /^(\d+),(\d+(?:\.\d+)?)([NSEW])$/i.exec(value.trim());
  if (!m) return undefined;
  const minutesFloat = Number(m[2]);
  const minutes = Math.trunc(minutesFloat);
  const seconds = (minutesFloat - minutes) * 60;
  return `${m[1]} deg ${minutes}' ${seconds.toFixed(2)}" ${m[3].toUpperCase()}`;
}

function altitudeMeters(value: string): number | undefined {
  const [num, den] = value.split("/");
  const meters = den === undefined ? Number(num) : Number(num) / Number(den);
  return Number.isFinite(meters) ? meters : undefined;
}

/**
 * XMP 座標（"32,54.99N"）轉為 QuickTime 使用的度分秒與 GPSCoordinates。
 * 格式無法辨識時回傳空物件。
 */
export function buildVideoGpsFields(gps: GpsFields): WriteFields {
  const latitude = toDms(gps.latitude);
  const longitude = toDms(gps.longitude);
  if (!latitude || !longitude) return {};

  const fields: WriteFields = {
    GPSLatitude: latitude,
    GPSLongitude: longitude,
  };
  const meters = gps.altitude ? altitudeMeters(gps.altitude) : undefined;
  if (meters === undefined) {
    fields["QuickTime:GPSCoordinates"] = `${latitude}, ${longitude}`;
    return fields;
  }
  const altitude = `${meters.toFixed(3)} m`;
  fields.GPSAltitude = altitude;
  fields.GPSAltitudeRef = "Above Sea Level";
  fields["QuickTime:GPSCoordinates"] =
    `${latitude}, ${longitude}, ${altitude} Above Sea Level`;
  return fields;
}

/**
 * 彙整資料展開為寫入標籤。每個有值的欄位依表寫入多個標籤；
 * 關鍵字在清單型標籤寫入陣列，其他標籤以 ", " 串接；影片另寫入 GPS。
 */
export function buildWriteFields(
  metadata: MediaMetadata,
  kind: MediaKind
): WriteFields {
  const table = tagTableOf(kind);
  const fields: WriteFields = {};
  const assign = (kindName: FieldKind, value: string | undefined) => {
    if (!value) return;
    for (const tag of table[kindName]) fields[tag] = value;
  };

  assign("title", metadata.title);
  assign("date", metadata.date);
  assign("caption", metadata.caption);
  assign("location", metadata.location.location);
  assign("city", metadata.location.city);
  assign("state", metadata.location.state);
  assign("country", metadata.location.country);

  if (metadata.keywords.length > 0) {
    for (const tag of table.keywords) {
      fields[tag] = isListTag(tag)
        ? [...metadata.keywords]
        : metadata.keywords.join(", ");
    }
  }

  if (kind === "video" && metadata.gps) {
    Object.assign(fields, buildVideoGpsFields(metadata.gps));
  }
  return fields;
}

import type { Logger } from "~shared/Logger";

import { isListTag, tagItems, tagNameOf } from "@/services/ExifService";
import { type FieldKind, tagTableOf } from "@/services/MetadataFields";
import type { MediaKind, MediaMetadata, TagMap } from "@/types";
import { datesMatch } from "@/utils/DateNormalizer";

export type VerifyIssue = {
  field: FieldKind;
  /** warning 不影響驗證結果 */
  severity: "error" | "warning";
  expected: string;
  found: string[];
};

export type VerifyReport = {
  passed: boolean;
  issues: VerifyIssue[];
};

/**
 * 寫入後重新讀取標籤，逐欄比對。
 * - 標題、說明、城市、國家：任一候選標籤完全相同
 * - 關鍵字：清單型標籤逐項比對，其他標籤逗號分割後比對；須包含所有預期值，不符只產生警告
 * - 日期：正規化後相同
 * - 地點：完全相同，或等於合併字串中的一段
 */
export class MetadataVerifier {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("MetadataVerifier");
  }

  verify(expected: MediaMetadata, tags: TagMap, kind: MediaKind): VerifyReport {
    const table = tagTableOf(kind);
    const entriesOf = (field: FieldKind) => {
      const names = new Set(table[field].map(tagNameOf));
      return Object.entries(tags).filter(([key]) => names.has(tagNameOf(key)));
    };
    const valuesOf = (field: FieldKind) =>
      entriesOf(field).flatMap(([, value]) => tagItems(value));

    const issues: VerifyIssue[] = [];
    const check = (
      field: FieldKind,
      value: string | undefined,
      matches: (candidate: string, value: string) => boolean
    ) => {
      if (!value) return;
      const found = valuesOf(field);
      if (found.some((candidate) => matches(candidate, value))) return;
      issues.push({ field, severity: "error", expected: value, found });
    };
    const exact = (candidate: string, value: string) => candidate === value;

    check("title", expected.title, exact);
    check("caption", expected.caption, exact);
    check("date", expected.date, datesMatch);
    check("location", expected.location.location, (candidate, value) =>
      candidate === value || candidate.split(", ").includes(value)
    );
    check("city", expected.location.city, exact);
    check("country", expected.location.country, exact);

    if (expected.keywords.length > 0) {
      const stored = new Set(
        entriesOf("keywords")
          .flatMap(([key, value]) =>
            Array.isArray(value) || isListTag(key)
              ? tagItems(value)
              : tagItems(value).flatMap((v) => v.split(","))
          )
          .map((v) => v.trim())
          .filter((v) => v !== "")
      );
      const missing = expected.keywords.filter((k) => !stored.has(k));
      if (missing.length > 0) {
        issues.push({
          field: "keywords",
          severity: "warning",
          expected: missing.join(", "),
          found: [...stored],
        });
      }
    }

    for (const issue of issues) {
      const level = issue.severity === "error" ? "error" : "warn";
      this.logger[level]({ field: issue.field, found: issue.found })`驗證不符: ${issue.field} 預期 ${issue.expected}`;
    }
    return {
      passed: issues.every((i) => i.severity !== "error"),
      issues,
    };
  }
}

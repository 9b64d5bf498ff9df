import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import type { AlbumMapping, AlbumMappingStore } from "@/services/AlbumMappingStore";
import type { AlbumInput, AlbumPathResolver } from "@/services/AlbumPathResolver";

export const DEFAULT_CATEGORY_PREFIX = "02";

/**
 * "分類: 內容" 形式的文字（恰好一個冒號且後接空白）轉為 `<prefix>/<分類>/<原文字>`。
 * 分類或內容為空時不產生路徑。
 */
export function categoryPath(text: string, prefix: string): string | undefined {
  const value = text.trim();
  if (value.split(":").length !== 2 || !value.includes(": ")) return undefined;
  const [category, detail] = value.split(":").map((part) => part.trim());
  if (!category || !detail) return undefined;
  return `${prefix}/${category}/${value}`;
}

function lookup(mapping: AlbumMapping, key: string): string[] {
  if (!Object.hasOwn(mapping, key)) return [];
  const value = mapping[key];
  return Array.isArray(value) ? value : [value];
}

function joinAlbum(base: string, album: string) {
  return `${base.replace(/\/+$/, "")}/${album}`;
}

/** 以 "/" 結尾的值加上標題作為相簿名稱（沒有標題則略過），其餘原樣使用 */
function expandValues(values: string[], title: string | undefined): string[] {
  return values.flatMap((value) => {
    if (!value.endsWith("/")) return [value];
    return title ? [`${value}${title}`] : [];
  });
}

export class AlbumPathResolverDefault implements AlbumPathResolver {
  private readonly logger: Logger;
  private readonly categoryPrefix: string;

  constructor(
    private readonly deps: {
      logger: Logger;
      mappingStore: AlbumMappingStore;
      categoryPrefix?: string;
    }
  ) {
    this.logger = deps.logger.extend("AlbumPathResolver");
    this.categoryPrefix = deps.categoryPrefix ?? DEFAULT_CATEGORY_PREFIX;
  }

  async resolve(input: AlbumInput): Promise<string[]> {
    const mappingResult = await this.deps.mappingStore.read();
    if (isErr(mappingResult)) {
      this.logger.error({
        reason: mappingResult.error.type,
      })`無法載入相簿對照表: ${mappingResult.error.message}`;
      return [];
    }
    const mapping = mappingResult.value;
    const title = input.title?.trim() || undefined;
    const paths: string[] = [];
    const add = (...items: Array<string | undefined>) => {
      for (const item of items) if (item) paths.push(item);
    };

    for (const raw of input.keywords) {
      const keyword = raw.trim();
      if (!keyword) continue;
      add(categoryPath(keyword, this.categoryPrefix));

      const slash = keyword.indexOf("/");
      if (slash >= 0) {
        const folder = keyword.slice(0, slash).trim();
        const album = keyword.slice(slash + 1).trim();
        const bases = lookup(mapping, folder);
        add(
          ...(album
            ? bases.map((base) => joinAlbum(base, album))
            : expandValues(bases, title))
        );
      } else if (!keyword.includes(":")) {
        add(...expandValues(lookup(mapping, keyword), title));
      }
    }

    for (const place of [input.city, input.state, input.location]) {
      const key = place?.trim();
      if (key) add(...expandValues(lookup(mapping, key), title));
    }

    if (title) add(categoryPath(title, this.categoryPrefix));

    const unique = [...new Set(paths)];
    this.logger.debug({ paths: unique })`相簿路徑 ${unique.length} 個`;
    return unique;
  }
}

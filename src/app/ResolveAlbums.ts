import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { AlbumMappingStoreJson } from "@/services/AlbumMappingStoreJson";
import { AlbumPathResolverDefault } from "@/services/AlbumPathResolverDefault";
import { ExifServiceExifTool } from "@/services/ExifService";
import { MetadataAggregatorDefault } from "@/services/MetadataAggregatorDefault";
import { expandHome } from "@/utils/helper";

export function registerResolveAlbums(cli: CAC, baseLogger: Logger) {
  cli
    .command("albums <file>", "依檔案內嵌標籤列出應放入的相簿")
    .action(async (file: string) => {
      const logger = baseLogger.extend("albums");
      const config = getAppConfig();
      const filePath = expandHome(file);

      const exifService = new ExifServiceExifTool({ logger });
      try {
        const tags = await exifService.readTags(filePath);
        if (isErr(tags)) {
          logger.error({ reason: tags.error.type })`${tags.error.message}`;
          process.exitCode = 1;
          return;
        }
        const metadata = new MetadataAggregatorDefault({
          logger,
          addRatingKeyword: config.ADD_RATING_KEYWORD,
        }).aggregate(undefined, tags.value);

        const resolver = new AlbumPathResolverDefault({
          logger,
          mappingStore: new AlbumMappingStoreJson(config.ALBUM_MAPPING_PATH),
          categoryPrefix: config.ALBUM_CATEGORY_PREFIX,
        });
        const albums = await resolver.resolve({
          keywords: metadata.keywords,
          title: metadata.title,
          city: metadata.location.city,
          state: metadata.location.state,
          location: metadata.location.location,
        });

        if (albums.length === 0) {
          logger.warn("沒有符合的相簿");
          return;
        }
        for (const album of albums) console.log(album);
      } finally {
        await dispose(exifService);
      }
    });
}

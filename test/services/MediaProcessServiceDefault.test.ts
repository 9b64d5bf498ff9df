import { describe, expect, test } from "vitest";

import { expectOk } from "~shared/testkit/ExpectResult";
import { buildTestLogger } from "~shared/testkit/TestLogger";

import { AlbumPathResolverDefault } from "@/services/AlbumPathResolverDefault";
import { FilenameGeneratorDefault } from "@/services/FilenameGeneratorDefault";
import { MediaProcessServiceDefault } from "@/services/MediaProcessServiceDefault";
import { MetadataAggregatorDefault } from "@/services/MetadataAggregatorDefault";
import { MetadataVerifier } from "@/services/MetadataVerifier";
import type { SidecarMetadata } from "@/services/SidecarReader";

import { AlbumMappingStoreFake } from "~test/fakes/AlbumMappingStoreFake";
import { ExifServiceFake } from "~test/fakes/ExifServiceFake";
import { MediaFileStoreFake } from "~test/fakes/MediaFileStoreFake";
import { SidecarReaderFake } from "~test/fakes/SidecarReaderFake";

const photo = "in/IMG_0001.JPG";
const sidecar = "in/IMG_0001.xmp";

const sidecarMetadata: SidecarMetadata = {
  title: "Castle at Dusk",
  keywords: ["Travel"],
  date: "2025:03:27 15:18:07",
  location: { city: "Stuttgart" },
};

function setup(files: string[], exifService = new ExifServiceFake()) {
  const logger = buildTestLogger();
  const fileStore = new MediaFileStoreFake(files);
  const sidecarReader = new SidecarReaderFake();
  const service = new MediaProcessServiceDefault({
    logger,
    exifService,
    sidecarReader,
    aggregator: new MetadataAggregatorDefault({ logger }),
    filenameGenerator: new FilenameGeneratorDefault(),
    verifier: new MetadataVerifier({ logger }),
    fileStore,
  });
  return { service, exifService, fileStore, sidecarReader };
}

describe("MediaProcessServiceDefault", () => {
  test("寫入、驗證後先刪 sidecar 再改名", async () => {
    const { service, exifService, fileStore, sidecarReader } = setup([
      photo,
      sidecar,
    ]);
    exifService.setTags(photo, { "EXIF:ISO": "100" });
    sidecarReader.set(sidecar, sidecarMetadata);

    const result = await service.process(photo);

    expect(result.state).toBe("RENAMED");
    expect(result.history).toEqual([
      "RECEIVED",
      "WRITE_PENDING",
      "WRITTEN",
      "VERIFIED",
      "CLEANUP",
      "RENAMED",
    ]);
    expect(result.finalPath).toBe("in/2025_03_27_Castle_at_Dusk_Stuttgart__LRE.jpg");
    expect(result.issues).toEqual([]);
    expect(exifService.writes).toHaveLength(1);
    expect(exifService.writes[0].fields["XMP-dc:Title"]).toBe("Castle at Dusk");
    expect(exifService.writes[0].fields["XMP-dc:Subject"]).toEqual(["Travel"]);
    expect(fileStore.operations).toEqual([
      { type: "remove", path: sidecar },
      {
        type: "rename",
        from: photo,
        to: "in/2025_03_27_Castle_at_Dusk_Stuttgart__LRE.jpg",
        filesAtCall: [photo],
      },
    ]);
    expect(fileStore.list()).toEqual([
      "in/2025_03_27_Castle_at_Dusk_Stuttgart__LRE.jpg",
    ]);
  });

  test("刪除 sidecar 失敗仍繼續改名", async () => {
    const { service, exifService, fileStore, sidecarReader } = setup([
      photo,
      sidecar,
    ]);
    exifService.setTags(photo, {});
    sidecarReader.set(sidecar, sidecarMetadata);
    fileStore.failRemove(sidecar);

    const result = await service.process(photo);

    expect(result.state).toBe("RENAMED");
    expect(fileStore.operations.map((o) => o.type)).toEqual(["remove", "rename"]);
    expect(result.issues).toEqual([
      {
        state: "CLEANUP",
        severity: "warning",
        message: `刪除 sidecar 失敗: EACCES: ${sidecar}`,
      },
    ]);
    expect(fileStore.list()).toEqual([
      "in/2025_03_27_Castle_at_Dusk_Stuttgart__LRE.jpg",
      sidecar,
    ]);
  });

  test("已帶完成標記的檔案不寫入也不刪除", async () => {
    const marked = "in/2025_03_27_Castle__LRE.jpg";
    const { service, exifService, fileStore } = setup([
      marked,
      "in/2025_03_27_Castle__LRE.xmp",
    ]);
    exifService.setTags(marked, { "XMP:Title": "Castle" });

    const result = await service.process(marked);

    expect(result.state).toBe("SKIP");
    expect(result.history).toEqual(["RECEIVED", "SKIP"]);
    expect(exifService.writes).toEqual([]);
    expect(fileStore.operations).toEqual([]);
  });

  test("沒有任何中繼資料時不寫入，直接以原檔名加標記改名", async () => {
    const file = "in/IMG_0002.JPG";
    const { service, exifService } = setup([file]);
    exifService.setTags(file, { "EXIF:ISO": "100" });

    const result = await service.process(file);

    expect(result.history).toEqual(["RECEIVED", "EMPTY", "CLEANUP", "RENAMED"]);
    expect(result.finalPath).toBe("in/IMG_0002__LRE.jpg");
    expect(exifService.writes).toEqual([]);
  });

  test("沒有日期時以原檔名加標記改名", async () => {
    const file = "in/IMG_0004.JPG";
    const { service, exifService, sidecarReader } = setup([
      file,
      "in/IMG_0004.xmp",
    ]);
    exifService.setTags(file, {});
    sidecarReader.set("in/IMG_0004.xmp", {
      title: "Harbour",
      keywords: [],
      location: {},
    });

    const result = await service.process(file);

    expect(result.state).toBe("RENAMED");
    expect(result.finalPath).toBe("in/IMG_0004__LRE.jpg");
    expect(exifService.writes).toHaveLength(1);
  });

  test("寫入失敗時保留 sidecar 與檔名", async () => {
    const { service, exifService, fileStore, sidecarReader } = setup([
      photo,
      sidecar,
    ]);
    exifService.setTags(photo, {});
    exifService.setWriteError(photo, { type: "WRITE_FAILED", message: "exit 1" });
    sidecarReader.set(sidecar, sidecarMetadata);

    const result = await service.process(photo);

    expect(result.state).toBe("WRITE_FAILED");
    expect(result.finalPath).toBe(photo);
    expect(result.issues).toEqual([
      { state: "WRITE_PENDING", severity: "error", message: "寫入失敗: exit 1" },
    ]);
    expect(fileStore.operations).toEqual([]);
    expect(fileStore.list()).toEqual([photo, sidecar]);
  });

  test("驗證不符時保留 sidecar 與檔名", async () => {
    const { service, exifService, fileStore, sidecarReader } = setup([
      photo,
      sidecar,
    ]);
    exifService.setTags(photo, {});
    exifService.setTagsAfterWrite(photo, {
      "XMP:Title": "Castle at Dawn",
      "EXIF:DateTimeOriginal": "2025:03:27 15:18:07",
      "XMP:City": "Stuttgart",
    });
    sidecarReader.set(sidecar, sidecarMetadata);

    const result = await service.process(photo);

    expect(result.state).toBe("VERIFY_FAILED");
    expect(result.history).toEqual([
      "RECEIVED",
      "WRITE_PENDING",
      "WRITTEN",
      "VERIFY_FAILED",
    ]);
    expect(result.issues).toEqual([
      {
        state: "WRITTEN",
        severity: "error",
        message: "title 預期 Castle at Dusk",
      },
      { state: "WRITTEN", severity: "warning", message: "keywords 預期 Travel" },
    ]);
    expect(fileStore.operations).toEqual([]);
  });

  test("目標檔名已存在時不覆蓋", async () => {
    const target = "in/2025_03_27_Castle_at_Dusk_Stuttgart__LRE.jpg";
    const { service, exifService, fileStore, sidecarReader } = setup([
      photo,
      sidecar,
      target,
    ]);
    exifService.setTags(photo, {});
    sidecarReader.set(sidecar, sidecarMetadata);

    const result = await service.process(photo);

    expect(result.state).toBe("RENAME_FAILED");
    expect(result.finalPath).toBe(photo);
    expect(fileStore.list()).toEqual([target, photo]);
  });

  test("檔案不存在時為 READ_FAILED", async () => {
    const { service } = setup([]);
    const result = await service.process("in/missing.jpg");
    expect(result.history).toEqual(["RECEIVED", "READ_FAILED"]);
    expect(result.issues).toEqual([
      {
        state: "RECEIVED",
        severity: "error",
        message: "No such file: in/missing.jpg",
      },
    ]);
  });

  test("未預期的例外不會拋出", async () => {
    class ThrowingExifService extends ExifServiceFake {
      override async readTags(): Promise<never> {
        throw new Error("boom");
      }
    }
    const { service } = setup([photo], new ThrowingExifService());

    const result = await service.process(photo);

    expect(result.state).toBe("READ_FAILED");
    expect(result.issues).toEqual([
      { state: "RECEIVED", severity: "error", message: "boom" },
    ]);
  });

  test("影片使用 <檔名>.xmp 形式的 sidecar 與影片標籤表", async () => {
    const video = "in/CLIP_0003.MOV";
    const videoSidecar = "in/CLIP_0003.MOV.xmp";
    const { service, exifService, fileStore, sidecarReader } = setup([
      video,
      videoSidecar,
    ]);
    exifService.setTags(video, {});
    sidecarReader.set(videoSidecar, {
      ...sidecarMetadata,
      gps: { latitude: "32,54.99N", longitude: "96,32.052W" },
    });

    const result = await service.process(video, { sequence: "2" });

    expect(result.state).toBe("RENAMED");
    expect(result.finalPath).toBe("in/2025_03_27_Castle_at_Dusk_Stuttgart_2__LRE.mov");
    expect(exifService.writes[0].fields["QuickTime:Title"]).toBe("Castle at Dusk");
    expect(exifService.writes[0].fields["QuickTime:GPSCoordinates"]).toBe(
      `32 deg 54' 59.40" N, 96 deg 32' 3.12" W`
    );
    expect(sidecarReader.reads).toEqual([videoSidecar]);
    expect(fileStore.operations[0]).toEqual({ type: "remove", path: videoSidecar });
  });
});

describe("處理後讀回標籤計算相簿", () => {
  test("讀回的地點可直接對應相簿", async () => {
    const { service, exifService, sidecarReader } = setup([photo, sidecar]);
    exifService.setTags(photo, {});
    sidecarReader.set(sidecar, {
      title: "Sunset",
      keywords: [],
      date: "2025:06:01 20:15:00",
      location: { location: "Schlossplatz", city: "Berlin", country: "Germany" },
    });

    const result = await service.process(photo);
    expect(result.state).toBe("RENAMED");

    const logger = buildTestLogger();
    const tags = await exifService.readTags(photo);
    expectOk(tags);
    const metadata = new MetadataAggregatorDefault({ logger }).aggregate(
      undefined,
      tags.value
    );
    expect(metadata.location.location).toBe("Schlossplatz");

    const resolver = new AlbumPathResolverDefault({
      logger,
      mappingStore: new AlbumMappingStoreFake({ Schlossplatz: "02/DE/Schlossplatz/" }),
    });
    expect(
      await resolver.resolve({
        keywords: metadata.keywords,
        title: metadata.title,
        city: metadata.location.city,
        state: metadata.location.state,
        location: metadata.location.location,
      })
    ).toEqual(["02/DE/Schlossplatz/Sunset"]);
  });
});

import { describe, expect, test } from "vitest";

import { hasCompletionMarker } from "@/services/FilenameGenerator";
import {
  FilenameGeneratorDefault,
  cleanComponent,
} from "@/services/FilenameGeneratorDefault";
import type { MediaMetadata } from "@/types";

const date = "2025:03:27 15:18:07";

function meta(partial: Partial<MediaMetadata>): MediaMetadata {
  return { keywords: [], location: {}, ...partial };
}

describe("cleanComponent", () => {
  test.each([
    ["My Photo: A Nice/View?", "My_Photo_A_Nice_View"],
    ["  __Hello   World__ ", "Hello_World"],
    ["(Draft) [v2] - final", "(Draft)_[v2]_-_final"],
    ["東京 タワー!", "東京_タワー"],
    ['{"title":"x"}', ""],
    ["[1, 2]", ""],
    [undefined, ""],
  ])("%s → %s", (input, expected) => {
    expect(cleanComponent(input)).toBe(expected);
  });

  test("最長 50 字", () => {
    expect(cleanComponent("a".repeat(60))).toBe("a".repeat(50));
  });
});

describe("FilenameGeneratorDefault", () => {
  const generator = new FilenameGeneratorDefault();

  test("組合所有元件並將副檔名轉小寫", () => {
    const name = generator.generate(
      meta({
        date,
        title: "My Photo: A Nice/View?",
        location: { location: "Old Town", city: "Miami", country: "USA" },
      }),
      "in/IMG_0001.JPG"
    );
    expect(name).toBe("2025_03_27_My_Photo_A_Nice_View_Old_Town_Miami_USA__LRE.jpg");
  });

  test("已包含在標題中的城市不重複（不分大小寫）", () => {
    const name = generator.generate(
      meta({
        date,
        title: "Miami Beach Sunset",
        location: { city: "miami", country: "USA" },
      }),
      "IMG_0001.jpg"
    );
    expect(name).toBe("2025_03_27_Miami_Beach_Sunset_USA__LRE.jpg");
  });

  test("已包含在前面地點元件中的城市不重複", () => {
    const name = generator.generate(
      meta({
        date,
        location: { location: "Stuttgart Schlossplatz", city: "Stuttgart" },
      }),
      "IMG_0001.jpg"
    );
    expect(name).toBe("2025_03_27_Stuttgart_Schlossplatz__LRE.jpg");
  });

  test("已包含在日期中的地點不重複", () => {
    const name = generator.generate(
      meta({ date, location: { location: "2025", city: "Paris" } }),
      "IMG_0001.jpg"
    );
    expect(name).toBe("2025_03_27_Paris__LRE.jpg");
  });

  test("沒有日期時回傳 undefined", () => {
    expect(generator.generate(meta({ title: "X" }), "IMG_0001.jpg")).toBe(
      undefined
    );
  });

  test("只有日期時退回原檔名", () => {
    expect(generator.generate(meta({ date }), "in/IMG_0001.JPG")).toBe(
      "IMG_0001__LRE.jpg"
    );
  });

  test("序號附加在最後", () => {
    expect(generator.generate(meta({ date }), "IMG_0001.jpg", "2")).toBe(
      "2025_03_27_2__LRE.jpg"
    );
    expect(
      generator.generate(meta({ date, title: "Dinner" }), "IMG_0001.jpg", "12")
    ).toBe("2025_03_27_Dinner_12__LRE.jpg");
  });

  test("JSON 形式的標題被略過", () => {
    const name = generator.generate(
      meta({ date, title: '{"a":1}', location: { city: "Paris" } }),
      "IMG_0001.heic"
    );
    expect(name).toBe("2025_03_27_Paris__LRE.heic");
  });

  test("重複呼叫結果相同", () => {
    const metadata = meta({
      date,
      title: "Castle at Dusk",
      location: { city: "Stuttgart", country: "Germany" },
    });
    const first = generator.generate(metadata, "IMG_0001.jpg", "3");
    const second = generator.generate(metadata, "IMG_0001.jpg", "3");
    expect(first).toBe("2025_03_27_Castle_at_Dusk_Stuttgart_Germany_3__LRE.jpg");
    expect(second).toBe(first);
  });

  test("fallback", () => {
    expect(generator.fallback("in/IMG_0002.MOV")).toBe("IMG_0002__LRE.mov");
  });
});

describe("hasCompletionMarker", () => {
  test.each([
    ["in/2025_03_27_Dinner__LRE.jpg", true],
    ["in/IMG_0001__LRE.mov", true],
    ["in/IMG_0001.jpg", false],
    ["in/__LRE/IMG_0001.jpg", false],
    ["in/IMG__LRE_0001.jpg", false],
    ["in/2025_03_27_Dinner__LRE_copy.jpg", false],
  ])("%s → %s", (input, expected) => {
    expect(hasCompletionMarker(input)).toBe(expected);
  });
});

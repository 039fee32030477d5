import { describe, it, expect } from "vitest";
import { cleanDataset, cleanRecord } from "./record";
import { CLEANED_FIELDS, type RawRecord } from "../types";

describe("cleanRecord", () => {
  it("cleans a typical scraped product", () => {
    const cleaned = cleanRecord({
      title: "  Great Deal!  ",
      description: "This is a fairly long product description text.",
      price: "$19.99",
      url: " http://example.com/x ",
    });

    expect(cleaned).toEqual({
      id: null,
      title: "Great Deal!",
      content: "This is a fairly long product description text.",
      price: 19.99,
      currency: "USD",
      url: "http://example.com/x",
      scraped_at: null,
    });
  });

  it("always emits the seven fields in order", () => {
    expect(Object.keys(cleanRecord({}))).toEqual([...CLEANED_FIELDS]);
    expect(Object.keys(cleanRecord({ extra: "ignored", title: "x" }))).toEqual([
      ...CLEANED_FIELDS,
    ]);
  });

  it("maps an empty record to all nulls", () => {
    expect(cleanRecord({})).toEqual({
      id: null,
      title: null,
      content: null,
      price: null,
      currency: null,
      url: null,
      scraped_at: null,
    });
  });

  it("prefers content over the legacy description", () => {
    const cleaned = cleanRecord({ content: "<p>New body</p>", description: "Old body" });
    expect(cleaned.content).toBe("New body");
  });

  it("falls back to description when content is blank", () => {
    const cleaned = cleanRecord({ content: "   ", description: "Old body" });
    expect(cleaned.content).toBe("Old body");
  });

  it("lets an explicit currency win over the price string", () => {
    expect(cleanRecord({ price: "$5", currency: "cad" }).currency).toBe("CAD");
    expect(cleanRecord({ price: 10, currency: "€" })).toMatchObject({
      price: 10,
      currency: "EUR",
    });
  });

  it("keeps the price currency when the explicit one is unrecognised", () => {
    expect(cleanRecord({ price: "$5", currency: "dollars" }).currency).toBe("USD");
  });

  it("stringifies and trims scalar ids", () => {
    expect(cleanRecord({ id: 42 }).id).toBe("42");
    expect(cleanRecord({ id: "  sku-1 " }).id).toBe("sku-1");
    expect(cleanRecord({ id: "   " }).id).toBeNull();
    expect(cleanRecord({ id: { nested: true } }).id).toBeNull();
  });

  it("passes url through with only trimming", () => {
    expect(cleanRecord({ url: "  ftp://bad  " }).url).toBe("ftp://bad");
  });

  it("normalises the scrape date", () => {
    expect(cleanRecord({ scraped_at: "25/12/2024" }).scraped_at).toBe("2024-12-25");
    expect(cleanRecord({ scraped_at: "not a date" }).scraped_at).toBeNull();
  });

  it("degrades every unparseable field to null without throwing", () => {
    const cleaned = cleanRecord({
      title: ["a", "b"],
      content: { html: "<p>x</p>" },
      price: "n/a",
      currency: 3,
      scraped_at: 1700000000,
    });
    expect(cleaned).toEqual({
      id: null,
      title: null,
      content: null,
      price: null,
      currency: null,
      url: null,
      scraped_at: null,
    });
  });

  it("is a fixed point on already-cleaned records", () => {
    const raws: RawRecord[] = [
      {
        id: " 7 ",
        title: "<h1>Blue &amp; Green</h1>",
        content: "Some\n\nmulti-line   content with <em>emphasis</em> inside it.",
        price: "1.234,50 EUR",
        url: " https://shop.test/p/7 ",
        scraped_at: "Mar 5, 2024",
      },
      { title: "", price: -5, url: "ftp://bad" },
      {},
      { title: "Fish &amp;amp; Chips" },
      { title: "Tom &amp;copy; 2024" },
      { title: "a &amp;lt;b&amp;gt; c" },
      { title: "＆ｌｔ；b＆ｇｔ；x" },
      { content: "&amp;amp;lt;script&amp;amp;gt;" },
    ];
    for (const raw of raws) {
      const once = cleanRecord(raw);
      expect(cleanRecord({ ...once })).toEqual(once);
    }
  });
});

describe("cleanDataset", () => {
  it("maps one output per input in order", () => {
    const cleaned = cleanDataset([{ id: "a" }, {}, { id: "c" }]);
    expect(cleaned.map((r) => r.id)).toEqual(["a", null, "c"]);
  });
});

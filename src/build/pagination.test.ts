import { describe, expect, it } from "vitest";
import { countPages, indexPageUrl, paginate } from "./pagination";

describe("paginate", () => {
  it("always yields one page", () => {
    expect(paginate([], 10)).toEqual([
      {
        number: 1,
        url: "/",
        items: [],
        pagination: { page: 1, total_pages: 1, prev_url: null, next_url: null },
      },
    ]);
  });

  it("links pages together", () => {
    const pages = paginate([1, 2, 3, 4, 5], 2);

    expect(pages.map((p) => [p.url, p.items])).toEqual([
      ["/", [1, 2]],
      ["/page/2/", [3, 4]],
      ["/page/3/", [5]],
    ]);
    expect(pages[1].pagination).toEqual({
      page: 2,
      total_pages: 3,
      prev_url: "/",
      next_url: "/page/3/",
    });
    expect(pages[2].pagination.next_url).toBeNull();
  });

  it("counts pages", () => {
    expect(countPages(0, 5)).toBe(1);
    expect(countPages(10, 5)).toBe(2);
    expect(countPages(11, 5)).toBe(3);
    expect(indexPageUrl(4)).toBe("/page/4/");
  });
});

import { describe, it, expect } from "vitest";
import { counterPage, helloPage, homePage } from "../../src/pages/builtin.js";
import { definePage, PageRegistry, pageIdOf, pageParametersOf } from "../../src/pages/registry.js";
import { PageUrl } from "../../src/render/page-url.js";

function registry(): PageRegistry {
  return new PageRegistry().mount(homePage).mount(counterPage).mount(helloPage);
}

describe("PageRegistry", () => {
  it("finds pages by name and by normalized path", () => {
    const pages = registry();
    expect(pages.get("counter")).toBe(counterPage);
    expect(pages.findByPath("/counter/")).toBe(counterPage);
    expect(pages.findByPath("/")).toBe(homePage);
    expect(pages.get("missing")).toBeUndefined();
    expect(pages.list().map((p) => p.name)).toEqual(["home", "counter", "hello"]);
  });

  it("refuses a second page with the same name", () => {
    expect(() => registry().mount({ ...helloPage, path: "/hi" })).toThrow('Page "hello" is already mounted');
  });

  it("refuses a second page on the same path", () => {
    const other = definePage({
      name: "other",
      path: "/counter/",
      stateless: true,
      createState: () => ({}),
      render: () => "",
    });
    expect(() => registry().mount(other)).toThrow('Path /counter is already mounted by page "counter"');
  });

  it("bookmarkable urls sort parameters and drop reserved ones", () => {
    const url = registry().bookmarkableUrl(helloPage, { name: "Ann", pageId: "3", action: "submit", a: "1" });
    expect(url.toString()).toBe("/hello?a=1&name=Ann");
  });

  it("instance urls add the page id last", () => {
    expect(registry().instanceUrl(counterPage, { start: "5" }, 2).toString()).toBe("/counter?start=5&pageId=2");
  });
});

describe("pageParametersOf", () => {
  it("drops reserved parameters and keeps the last value", () => {
    const url = PageUrl.parse("/counter?start=5&pageId=1&action=submit&start=6");
    expect(pageParametersOf(url)).toEqual({ start: "6" });
  });
});

describe("pageIdOf", () => {
  it("reads a numeric page id", () => {
    expect(pageIdOf(PageUrl.parse("/counter?pageId=12"))).toBe(12);
  });

  it("ignores missing or non-numeric ids", () => {
    expect(pageIdOf(PageUrl.parse("/counter"))).toBeUndefined();
    expect(pageIdOf(PageUrl.parse("/counter?pageId=abc"))).toBeUndefined();
    expect(pageIdOf(PageUrl.parse("/counter?pageId=-1"))).toBeUndefined();
  });
});

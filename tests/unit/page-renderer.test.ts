import { describe, it, expect } from "vitest";
import { counterPage, homePage, legacyPage } from "../../src/pages/builtin.js";
import { PageProvider } from "../../src/pages/provider.js";
import { definePage, PageRegistry } from "../../src/pages/registry.js";
import { PageRenderer, RenderCycle } from "../../src/pages/renderer.js";
import { PageSession } from "../../src/pages/session.js";
import type { PageDefinition, PageParameters } from "../../src/pages/types.js";
import { PageUrl } from "../../src/render/page-url.js";

const createdPage = definePage<Record<string, never>>({
  name: "created",
  path: "/created",
  stateless: true,
  createState: () => ({}),
  render: async (ctx) => {
    ctx.response.setStatus(201).setHeader("X-Created", "yes");
    return `<p>${ctx.url.toString()}</p>`;
  },
});

const brokenLinkPage = definePage<Record<string, never>>({
  name: "broken",
  path: "/broken",
  stateless: true,
  createState: () => ({}),
  render: (ctx) => `<a href="${ctx.urlFor("nope")}">x</a>`,
});

const awayPage = definePage<Record<string, never>>({
  name: "away",
  path: "/away",
  stateless: true,
  createState: () => ({}),
  render: (ctx) => {
    ctx.replaceResponse({ location: "https://example.test/elsewhere" });
    return "<p>never sent</p>";
  },
});

function renderer(definition: PageDefinition, parameters: PageParameters = {}) {
  const registry = new PageRegistry();
  for (const page of [homePage, counterPage, legacyPage, createdPage, brokenLinkPage, awayPage]) {
    registry.mount(page);
  }
  const session = new PageSession("sid", true);
  const cycle = new RenderCycle();
  const provider = new PageProvider(registry, session, definition, parameters);
  return { renderer: new PageRenderer(registry, provider, cycle), cycle, session };
}

describe("PageRenderer", () => {
  it("renders markup into a buffered html response", async () => {
    const { renderer: home } = renderer(homePage);

    const response = await home.render(PageUrl.parse("/"));

    expect(response?.statusCode).toBe(200);
    expect(response?.contentType).toBe("text/html; charset=utf-8");
    expect(response?.getText()).toContain('<li><a href="/counter">Counter</a></li>');
  });

  it("posts stateful forms back to the instance url", async () => {
    const { renderer: counter, session } = renderer(counterPage, { start: "2" });

    const response = await counter.render(PageUrl.parse("/counter?start=2"));

    expect(session.pageCount).toBe(1);
    expect(response?.getText()).toContain('<span id="count">2</span>');
    expect(response?.getText()).toContain('action="/counter?start=2&amp;pageId=1&amp;action=submit"');
  });

  it("keeps status and headers the page sets", async () => {
    const { renderer: created } = renderer(createdPage);

    const response = await created.render(PageUrl.parse("/created?from=test"));

    expect(response?.statusCode).toBe(201);
    expect(response?.headers).toEqual({ "x-created": "yes" });
    expect(response?.getText()).toBe("<p>/created?from=test</p>");
  });

  it("yields no result and leaves the replacement on the cycle", async () => {
    const { renderer: legacy, cycle } = renderer(legacyPage);

    expect(await legacy.render(PageUrl.parse("/legacy"))).toBeUndefined();
    expect(cycle.takeReplacement()).toEqual({ page: "home" });
    expect(cycle.hasReplacement()).toBe(false);
  });

  it("discards markup when replaced by a location", async () => {
    const { renderer: away, cycle } = renderer(awayPage);

    expect(await away.render(PageUrl.parse("/away"))).toBeUndefined();
    expect(cycle.takeReplacement()).toEqual({ location: "https://example.test/elsewhere" });
  });

  it("fails a render that links to an unmounted page", async () => {
    const { renderer: broken } = renderer(brokenLinkPage);

    await expect(broken.render(PageUrl.parse("/broken"))).rejects.toThrow('No page named "nope" is mounted');
  });
});

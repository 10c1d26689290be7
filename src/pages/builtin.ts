/**
 * Built-in pages mounted by the server
 */

import { escapeHtml, htmlDocument } from "./html.js";
import { definePage } from "./registry.js";
import type { PageDefinition } from "./types.js";

export const homePage = definePage<Record<string, never>>({
  name: "home",
  path: "/",
  stateless: true,
  createState: () => ({}),
  render: (ctx) =>
    htmlDocument(
      "Home",
      `<h1>Home</h1><ul>` +
        `<li><a href="${escapeHtml(ctx.urlFor("counter"))}">Counter</a></li>` +
        `<li><a href="${escapeHtml(ctx.urlFor("hello"))}">Hello</a></li>` +
        `</ul>`
    ),
});

/**
 * Stateful: the count lives on the page instance in the session
 */
export const counterPage = definePage<{ count: number }>({
  name: "counter",
  path: "/counter",
  stateless: false,
  createState: (parameters) => ({ count: Number(parameters.start ?? "0") || 0 }),
  render: (ctx) =>
    htmlDocument(
      "Counter",
      `<h1>Count: <span id="count">${ctx.state.count}</span></h1>` +
        `<form method="post" action="${escapeHtml(ctx.actionUrl())}">` +
        `<button name="op" value="increment">+</button>` +
        `<button name="op" value="decrement">-</button>` +
        `</form>`
    ),
  onSubmit: (ctx) => {
    ctx.state.count += ctx.form.op === "decrement" ? -1 : 1;
  },
});

/**
 * Stateless: everything it shows comes from the url
 */
export const helloPage = definePage<{ name: string }>({
  name: "hello",
  path: "/hello",
  stateless: true,
  createState: (parameters) => ({ name: parameters.name ?? "" }),
  render: (ctx) =>
    htmlDocument(
      "Hello",
      (ctx.state.name ? `<h1>Hello, ${escapeHtml(ctx.state.name)}</h1>` : `<h1>Hello</h1>`) +
        `<form method="post" action="${escapeHtml(ctx.actionUrl())}">` +
        `<input name="name" value="${escapeHtml(ctx.state.name)}">` +
        `<button>Greet</button>` +
        `</form>`
    ),
  onSubmit: (ctx) => {
    ctx.setResponsePage("hello", ctx.form.name ? { name: ctx.form.name } : {});
  },
});

/**
 * Old address kept for links in the wild; hands the response to home
 */
export const legacyPage = definePage<Record<string, never>>({
  name: "legacy",
  path: "/legacy",
  stateless: true,
  createState: () => ({}),
  render: (ctx) => {
    ctx.replaceResponse({ page: "home" });
    return "";
  },
});

export const BUILTIN_PAGES: PageDefinition[] = [homePage, counterPage, helloPage, legacyPage];

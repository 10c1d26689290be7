import { PageUrl } from "../render/page-url.js";
import type { PageDefinition, PageParameters } from "./types.js";

/** Query parameter carrying a stateful instance's page id */
export const PAGE_ID_PARAM = "pageId";
/** Query parameter marking a form post-back */
export const ACTION_PARAM = "action";

const RESERVED_PARAMS = new Set([PAGE_ID_PARAM, ACTION_PARAM]);

/**
 * Infer TState from the definition literal
 */
export function definePage<TState>(definition: PageDefinition<TState>): PageDefinition<TState> {
  return definition;
}

/**
 * Mounted page definitions and the url scheme for them.
 *
 * Bookmarkable url: mount path + page parameters sorted by name.
 * Instance url: bookmarkable url + pageId.
 */
export class PageRegistry {
  private readonly byName = new Map<string, PageDefinition>();
  private readonly byPath = new Map<string, PageDefinition>();

  mount(definition: PageDefinition): this {
    const path = new PageUrl(definition.path).path;

    if (this.byName.has(definition.name)) {
      throw new Error(`Page "${definition.name}" is already mounted`);
    }
    const clash = this.byPath.get(path);
    if (clash) {
      throw new Error(`Path ${path} is already mounted by page "${clash.name}"`);
    }

    this.byName.set(definition.name, definition);
    this.byPath.set(path, definition);
    return this;
  }

  get(name: string): PageDefinition | undefined {
    return this.byName.get(name);
  }

  findByPath(path: string): PageDefinition | undefined {
    return this.byPath.get(new PageUrl(path).path);
  }

  list(): PageDefinition[] {
    return [...this.byName.values()];
  }

  bookmarkableUrl(definition: PageDefinition, parameters: PageParameters): PageUrl {
    const query = Object.keys(parameters)
      .filter((name) => !RESERVED_PARAMS.has(name))
      .sort()
      .map((name) => ({ name, value: parameters[name] }));
    return new PageUrl(definition.path, query);
  }

  instanceUrl(definition: PageDefinition, parameters: PageParameters, pageId: number): PageUrl {
    return this.bookmarkableUrl(definition, parameters).withParameter(PAGE_ID_PARAM, String(pageId));
  }
}

/**
 * Page parameters of a request url (reserved parameters removed, last value wins)
 */
export function pageParametersOf(url: PageUrl): PageParameters {
  const parameters: PageParameters = {};
  for (const { name, value } of url.query) {
    if (!RESERVED_PARAMS.has(name)) {
      parameters[name] = value;
    }
  }
  return parameters;
}

export function pageIdOf(url: PageUrl): number | undefined {
  const raw = url.getParameter(PAGE_ID_PARAM);
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return undefined;
  }
  return Number(raw);
}

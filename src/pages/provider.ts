/**
 * Page provider
 *
 * Resolves a render target to a page instance lazily. Until something asks
 * for the instance, the provider can answer whether one exists already and
 * which url the target maps to, without creating anything.
 */

import type { PageUrl } from "../render/page-url.js";
import type { PageFactsSource } from "../render/types.js";
import type { PageRegistry } from "./registry.js";
import type { PageSession } from "./session.js";
import { PageInstance, type PageDefinition, type PageParameters } from "./types.js";

export class PageProvider implements PageFactsSource {
  private instance: PageInstance | undefined;

  constructor(
    private readonly registry: PageRegistry,
    private readonly session: PageSession,
    readonly definition: PageDefinition,
    readonly parameters: PageParameters,
    private readonly pageId?: number
  ) {}

  /**
   * Wrap an instance that already exists
   */
  static forInstance(registry: PageRegistry, session: PageSession, instance: PageInstance): PageProvider {
    const provider = new PageProvider(registry, session, instance.definition, instance.parameters, instance.id);
    provider.instance = instance;
    return provider;
  }

  isNewPageInstance(): boolean {
    return this.instance === undefined && this.storedInstance() === undefined;
  }

  isPageStateless(): boolean {
    return this.definition.stateless;
  }

  /**
   * Existing instance, or a new one. New stateful instances are stored in the
   * session, which binds it.
   */
  getPageInstance(): PageInstance {
    if (this.instance) {
      return this.instance;
    }

    const stored = this.storedInstance();
    if (stored) {
      this.instance = stored;
      return stored;
    }

    const created = new PageInstance(
      this.definition,
      this.parameters,
      this.definition.createState(this.parameters)
    );
    if (!this.definition.stateless) {
      this.session.storePage(created);
    }
    this.instance = created;
    return created;
  }

  /**
   * Canonical url: the instance url once a stateful instance exists, the
   * bookmarkable url otherwise.
   */
  targetUrl(): PageUrl {
    const existing = this.instance ?? this.storedInstance();
    if (existing && existing.id !== undefined && !this.definition.stateless) {
      return this.registry.instanceUrl(this.definition, existing.parameters, existing.id);
    }
    return this.registry.bookmarkableUrl(this.definition, this.parameters);
  }

  private storedInstance(): PageInstance | undefined {
    if (this.pageId === undefined || this.definition.stateless) {
      return undefined;
    }
    const stored = this.session.getPage(this.pageId);
    // a page id from another page's mount path is not ours
    return stored && stored.definition === this.definition ? stored : undefined;
  }
}

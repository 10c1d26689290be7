/**
 * Page definitions and instances
 *
 * A page definition is mounted at a path and renders markup from its state.
 * Stateful pages keep one instance per session under a numeric page id;
 * stateless pages are recreated from their url on every request.
 */

import type { BufferedResponseWriter } from "../render/buffered-response.js";
import type { PageUrl } from "../render/page-url.js";
import type { RedirectPolicy } from "../render/types.js";

export type PageParameters = Record<string, string>;
export type FormFields = Record<string, string>;

/**
 * Where a replaced response goes instead: another page, or any location
 */
export type ReplacementTarget =
  | { page: string; parameters?: PageParameters }
  | { location: string };

export interface PageRenderContext<TState> {
  readonly state: TState;
  readonly parameters: PageParameters;
  /** Url the markup is rendered for */
  readonly url: PageUrl;
  /** Status, headers and cookies of the rendered response */
  readonly response: BufferedResponseWriter;
  /** Bookmarkable url of a mounted page */
  urlFor(page: string, parameters?: PageParameters): string;
  /** Url that posts back to this page instance */
  actionUrl(): string;
  /**
   * Abandon this render; the target takes over the response.
   */
  replaceResponse(target: ReplacementTarget): void;
}

export interface PageSubmitContext<TState> {
  readonly state: TState;
  readonly parameters: PageParameters;
  readonly form: FormFields;
  /** Respond with another page instead of this one */
  setResponsePage(page: string, parameters?: PageParameters): void;
}

export interface PageDefinition<TState = unknown> {
  name: string;
  /** Mount path, e.g. "/counter" */
  path: string;
  stateless: boolean;
  /** Falls back to the configured default */
  redirectPolicy?: RedirectPolicy;
  createState(parameters: PageParameters): TState;
  render(ctx: PageRenderContext<TState>): string | Promise<string>;
  onSubmit?(ctx: PageSubmitContext<TState>): void | Promise<void>;
}

export class PageInstance<TState = unknown> {
  /** Assigned when a stateful instance is stored in its session */
  id: number | undefined;

  constructor(
    readonly definition: PageDefinition<TState>,
    readonly parameters: PageParameters,
    readonly state: TState
  ) {}
}

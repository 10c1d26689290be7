/**
 * Comparable page URL
 *
 * Path plus ordered query parameters. Two URLs are equal when their canonical
 * strings are equal; the canonical form collapses repeated slashes and drops
 * a trailing slash (the root path keeps its slash).
 */

export interface QueryParameter {
  name: string;
  value: string;
}

// Base only used to let URL parse relative references
const PARSE_BASE = "http://page.invalid";

function normalizePath(path: string): string {
  const collapsed = path.replace(/\/{2,}/g, "/");
  const withLeading = collapsed.startsWith("/") ? collapsed : `/${collapsed}`;
  if (withLeading.length > 1 && withLeading.endsWith("/")) {
    return withLeading.slice(0, -1);
  }
  return withLeading;
}

// "//x" would otherwise be read as a host
function parseInput(raw: string): string {
  return raw.startsWith("//") ? raw.replace(/^\/+/, "/") : raw;
}

export class PageUrl {
  readonly path: string;
  readonly query: readonly QueryParameter[];
  private readonly canonical: string;

  constructor(path: string, query: readonly QueryParameter[] = []) {
    this.path = normalizePath(path);
    this.query = query.map((p) => ({ name: p.name, value: p.value }));

    const search = new URLSearchParams();
    for (const p of this.query) {
      search.append(p.name, p.value);
    }
    const qs = search.toString();
    this.canonical = qs.length > 0 ? `${this.path}?${qs}` : this.path;
  }

  /**
   * Parse a path-and-query or absolute URL. Scheme, host and fragment are dropped.
   */
  static parse(raw: string): PageUrl {
    const url = new URL(parseInput(raw), PARSE_BASE);
    const query: QueryParameter[] = [];
    url.searchParams.forEach((value, name) => {
      query.push({ name, value });
    });
    return new PageUrl(url.pathname, query);
  }

  /**
   * Like parse, but undefined for input URL cannot read (e.g. "http://[")
   */
  static tryParse(raw: string): PageUrl | undefined {
    return URL.canParse(parseInput(raw), PARSE_BASE) ? PageUrl.parse(raw) : undefined;
  }

  getParameter(name: string): string | undefined {
    return this.query.find((p) => p.name === name)?.value;
  }

  withParameter(name: string, value: string): PageUrl {
    return new PageUrl(this.path, [...this.query.filter((p) => p.name !== name), { name, value }]);
  }

  equals(other: PageUrl): boolean {
    return this.canonical === other.canonical;
  }

  toString(): string {
    return this.canonical;
  }
}

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";
import cookie from "@fastify/cookie";
import { z } from "zod";
import { FastifyRequestFacts } from "../http/request-facts.js";
import { FastifyResponseSink } from "../http/response-sink.js";
import { ResponseStrategyEngine } from "../render/engine.js";
import { PageUrl } from "../render/page-url.js";
import type {
  BufferedResponseStore,
  RedirectPolicy,
  RenderSettings,
  RespondOutcome,
  RespondOutcomeKind,
} from "../render/types.js";
import { PageProvider } from "../pages/provider.js";
import { PageRegistry, pageIdOf, pageParametersOf } from "../pages/registry.js";
import { PageRenderer, RenderCycle } from "../pages/renderer.js";
import { SESSION_COOKIE, SessionManager, type PageSession } from "../pages/session.js";
import type { PageDefinition, PageParameters } from "../pages/types.js";
import { PageNotFoundError, PageServiceError, ReplacementLoopError } from "../utils/errors.js";

/**
 * Page Rendering Plugin
 *
 * Mounts every page definition at its path (GET renders, POST submits) and
 * answers each request through the response strategy engine:
 * - session from the PSID cookie, temporary until a stateful page is stored
 * - form posts run onSubmit, then POST/redirect/GET through the buffer
 * - responses replaced during rendering are followed up to MAX_REPLACEMENTS
 */

export const MAX_REPLACEMENTS = 5;

export interface PageRenderingOptions {
  pages: PageDefinition[];
  store: BufferedResponseStore;
  settings: RenderSettings;
  defaultRedirectPolicy: RedirectPolicy;
  sessions: { maxEntries: number; ttlMs: number };
}

export type RespondOutcomeCounts = Record<RespondOutcomeKind, number>;

declare module "fastify" {
  interface FastifyInstance {
    pageRegistry: PageRegistry;
    pageSessions: SessionManager;
    responseStrategy: ResponseStrategyEngine;
    bufferedResponses: BufferedResponseStore;
    respondOutcomes(): RespondOutcomeCounts;
  }
  interface FastifyReply {
    /** Respond with a mounted page through the response strategy engine */
    renderPage(page: string, parameters?: PageParameters): Promise<RespondOutcome>;
  }
}

const FormFieldsSchema = z.record(z.string(), z.string()).default({});

/**
 * Session for this request. Binding a temporary one sets the cookie on the reply.
 */
function resolveSession(sessions: SessionManager, request: FastifyRequest, reply: FastifyReply): PageSession {
  const session = sessions.resolve(request.cookies[SESSION_COOKIE]);
  if (session.isTemporary()) {
    session.onBind((bound) => {
      reply.setCookie(SESSION_COOKIE, bound.id, { path: "/", httpOnly: true, sameSite: "lax" });
    });
  }
  return session;
}

async function pageRenderingPlugin(fastify: FastifyInstance, options: PageRenderingOptions) {
  await fastify.register(cookie);

  // Fastify ships no urlencoded parser; form posts are flat string records
  fastify.addContentTypeParser(
    "application/x-www-form-urlencoded",
    { parseAs: "string" },
    (_request, body, done) => {
      done(null, Object.fromEntries(new URLSearchParams(String(body))));
    }
  );

  const registry = new PageRegistry();
  for (const page of options.pages) {
    registry.mount(page);
  }

  const engine = new ResponseStrategyEngine(options.store, options.settings);
  const sessions = new SessionManager(options.sessions.maxEntries, options.sessions.ttlMs);

  const outcomes: RespondOutcomeCounts = {
    buffered: 0,
    write: 0,
    redirect: 0,
    buffer_and_redirect: 0,
    preempted: 0,
  };

  fastify.decorate("pageRegistry", registry);
  fastify.decorate("pageSessions", sessions);
  fastify.decorate("responseStrategy", engine);
  fastify.decorate("bufferedResponses", options.store);
  fastify.decorate("respondOutcomes", () => ({ ...outcomes }));

  /**
   * Respond with the provider's page, then with each replacement it schedules
   */
  async function respondWith(
    provider: PageProvider,
    session: PageSession,
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<RespondOutcome> {
    const requestFacts = new FastifyRequestFacts(request);
    const sink = new FastifyResponseSink(reply, requestFacts.isAjax());
    const cycle = new RenderCycle();
    const chain = [provider.definition.name];

    let current = provider;
    for (;;) {
      const outcome = await engine.respond({
        targetUrl: current.targetUrl(),
        request: requestFacts,
        page: current,
        session,
        redirectPolicy: current.definition.redirectPolicy ?? options.defaultRedirectPolicy,
        response: sink,
        renderer: new PageRenderer(registry, current, cycle),
      });
      outcomes[outcome.kind]++;

      if (outcome.kind !== "preempted") {
        return outcome;
      }

      const replacement = cycle.takeReplacement();
      if (!replacement) {
        throw new PageServiceError(`Page "${current.definition.name}" produced no response`, "INTERNAL");
      }

      if ("location" in replacement) {
        request.log.debug({ from: current.definition.name, location: replacement.location }, "Response replaced by redirect");
        sink.redirectTo(replacement.location);
        return outcome;
      }

      chain.push(replacement.page);
      if (chain.length > MAX_REPLACEMENTS + 1) {
        throw new ReplacementLoopError(chain);
      }

      const next = registry.get(replacement.page);
      if (!next) {
        throw new PageNotFoundError(replacement.page);
      }
      request.log.debug({ from: current.definition.name, to: next.name }, "Response replaced by page");
      current = new PageProvider(registry, session, next, replacement.parameters ?? {});
    }
  }

  function providerFor(definition: PageDefinition, session: PageSession, request: FastifyRequest): PageProvider {
    const url = PageUrl.parse(request.url);
    return new PageProvider(registry, session, definition, pageParametersOf(url), pageIdOf(url));
  }

  for (const definition of registry.list()) {
    fastify.get(definition.path, async (request, reply) => {
      const session = resolveSession(sessions, request, reply);
      await respondWith(providerFor(definition, session, request), session, request, reply);
      return reply;
    });

    fastify.post(definition.path, async (request, reply) => {
      const form = FormFieldsSchema.parse(request.body);
      const session = resolveSession(sessions, request, reply);
      const provider = providerFor(definition, session, request);
      const instance = provider.getPageInstance();

      const submitted: { responsePage?: { page: string; parameters: PageParameters } } = {};
      await definition.onSubmit?.({
        state: instance.state,
        parameters: instance.parameters,
        form,
        setResponsePage(page, parameters = {}) {
          submitted.responsePage = { page, parameters };
        },
      });

      let target = provider;
      const { responsePage } = submitted;
      if (responsePage) {
        const next = registry.get(responsePage.page);
        if (!next) {
          throw new PageNotFoundError(responsePage.page);
        }
        target = new PageProvider(registry, session, next, responsePage.parameters);
      }

      await respondWith(target, session, request, reply);
      return reply;
    });
  }

  fastify.decorateReply(
    "renderPage",
    async function renderPage(this: FastifyReply, page: string, parameters: PageParameters = {}) {
      const definition = registry.get(page);
      if (!definition) {
        throw new PageNotFoundError(page);
      }
      const session = resolveSession(sessions, this.request, this);
      return respondWith(new PageProvider(registry, session, definition, parameters), session, this.request, this);
    }
  );
}

export default fp(pageRenderingPlugin, {
  name: "page-rendering",
  fastify: "5.x",
});

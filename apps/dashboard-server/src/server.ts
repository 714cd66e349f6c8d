import cors from '@fastify/cors';
import {
  categorizePullRequests,
  isDashboardError,
  laneNames,
  loadConfig,
  startOfUtcDay,
  type DashboardConfig,
} from '@prdash/core';
import { listPullRequestsFromDb, resetDb } from '@prdash/state-db';
import Fastify, { type FastifyReply, type FastifyRequest } from 'fastify';
import { z } from 'zod';

import { Correlator } from './correlator.js';
import { GitHubClient } from './githubClient.js';
import { IssueActionService } from './issueActions.js';
import { JiraClient } from './jiraClient.js';
import { consoleLogger, type Logger } from './logger.js';
import { Poller } from './poller.js';

function isLocalAddress(addr: string | undefined | null): boolean {
  const a = (addr ?? '').trim();
  return a === '127.0.0.1' || a === '::1' || a === '::ffff:127.0.0.1';
}

const keyParamsSchema = z.object({ key: z.string().min(1) });
const transitionBodySchema = z.object({
  lane: z.enum(laneNames),
  draft: z.boolean().optional(),
});

function sendError(reply: FastifyReply, err: unknown) {
  if (isDashboardError(err)) {
    return reply.code(err.status).send({ ok: false, code: err.code, error: err.message });
  }
  if (err instanceof z.ZodError) {
    const issue = err.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return reply.code(400).send({ ok: false, code: 'invalid_request', error: `${where}${issue?.message ?? 'invalid request'}` });
  }
  return reply.code(500).send({ ok: false, code: 'internal_error', error: err instanceof Error ? err.message : String(err) });
}

export type DashboardServerDeps = Readonly<{
  config: Pick<DashboardConfig, 'dataDir'>;
  poller: Poller;
  actions: IssueActionService;
  allowRemote: boolean;
  now?: () => Date;
}>;

export async function buildServer(deps: DashboardServerDeps) {
  const { config, poller, actions } = deps;
  const now = deps.now ?? (() => new Date());
  const { allowRemote } = deps;

  const app = Fastify({ logger: false });
  await app.register(cors, { origin: true });

  function requireMutatingAllowed(req: FastifyRequest): { ok: true } | { ok: false; status: number; error: string } {
    if (allowRemote) return { ok: true };
    if (isLocalAddress(req.socket.remoteAddress)) return { ok: true };
    return { ok: false, status: 403, error: 'This endpoint is only allowed from localhost. Restart with --allow-remote to enable it.' };
  }

  app.get('/api/health', async () => ({
    ok: true,
    jiraEnabled: actions.enabled,
    polling: poller.isRunning(),
    lastPass: poller.getLastPass(),
  }));

  app.get('/api/pull-requests', async (_req, reply) => {
    try {
      const records = listPullRequestsFromDb(config.dataDir, { mergedSince: startOfUtcDay(now()).toISOString() });
      return reply.send({ ok: true, count: records.length, groups: categorizePullRequests(records) });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post('/api/poll', async (req, reply) => {
    const gate = requireMutatingAllowed(req);
    if (!gate.ok) return reply.code(gate.status).send({ ok: false, code: 'authorization_denied', error: gate.error });
    try {
      const summary = await poller.runPass();
      return reply.send({ ok: true, summary });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post('/api/jira/:key/transition', async (req, reply) => {
    const gate = requireMutatingAllowed(req);
    if (!gate.ok) return reply.code(gate.status).send({ ok: false, code: 'authorization_denied', error: gate.error });
    try {
      const { key } = keyParamsSchema.parse(req.params);
      const body = transitionBodySchema.parse(req.body ?? {});
      const outcome = await actions.transitionForLane(key, body.lane, body.draft);
      if (outcome.ok) return reply.send({ ok: true, outcome });

      const remote = outcome.code === 'remote_unavailable';
      return reply.code(remote ? 502 : 422).send({
        ok: false,
        code: remote ? 'remote_unavailable' : 'transition_unreachable',
        error: outcome.reason,
        outcome,
      });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post('/api/jira/:key/components/fix', async (req, reply) => {
    const gate = requireMutatingAllowed(req);
    if (!gate.ok) return reply.code(gate.status).send({ ok: false, code: 'authorization_denied', error: gate.error });
    try {
      const { key } = keyParamsSchema.parse(req.params);
      const result = await actions.fixComponents(key);
      return reply.send({ ok: true, ...result });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  app.post('/api/jira/:key/assign', async (req, reply) => {
    const gate = requireMutatingAllowed(req);
    if (!gate.ok) return reply.code(gate.status).send({ ok: false, code: 'authorization_denied', error: gate.error });
    try {
      const { key } = keyParamsSchema.parse(req.params);
      const result = await actions.assignToMe(key);
      return reply.send({ ok: true, ...result });
    } catch (err) {
      return sendError(reply, err);
    }
  });

  return { app, allowRemote };
}

export type StartServerOptions = Readonly<{
  host: string;
  port: number;
  allowRemote: boolean;
  resetDb?: boolean;
  logger?: Logger;
}>;

/** Wires the real clients from configuration, starts polling and listens. */
export async function startServer(options: StartServerOptions): Promise<void> {
  const logger = options.logger ?? consoleLogger;
  const config = await loadConfig();

  if (options.resetDb) {
    resetDb(config.dataDir);
    logger.info(`[server] reset database in ${config.dataDir}`);
  }

  const jira = config.jira
    ? new JiraClient({
        connection: config.jira,
        username: config.jiraUsername,
        timeoutMs: config.remoteTimeoutMs,
        logger,
      })
    : null;
  const github = new GitHubClient({ token: config.githubToken, timeoutMs: config.remoteTimeoutMs });
  const correlator = new Correlator({
    issues: jira,
    componentRepoMap: config.componentRepoMap,
    identity: {
      jiraUsername: config.jiraUsername,
      jiraEmail: config.jira?.email ?? null,
      githubUsername: config.githubUsername,
    },
    logger,
  });
  const poller = new Poller({ config, github, correlator, logger });
  const actions = new IssueActionService({ config, tracker: jira, logger });

  const { app } = await buildServer({ config, poller, actions, allowRemote: options.allowRemote || config.allowRemote });
  app.addHook('onClose', async () => {
    await poller.stop();
  });

  await app.listen({ port: options.port, host: options.host });
  logger.info(`[server] listening on http://${options.host}:${options.port} (jira ${jira ? 'enabled' : 'disabled'})`);
  poller.start();
}

/**
 * HTTP surface
 *
 * Thin express layer over the orchestrator: validates wire bodies with zod,
 * maps camelCase results to snake_case and MemoryErrors to their status.
 */

import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";

import express, { type ErrorRequestHandler, type Request, type RequestHandler, type Response } from "express";
import { ZodError } from "zod";

import { describeError, MemoryError } from "../errors.js";
import type { RetrievedChunk } from "../memory/types.js";
import type { MemoryRuntime } from "../runtime.js";
import { QueryRequestSchema, UploadRequestSchema } from "./schemas.js";

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

function asyncHandler(route: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    void route(req, res).catch(next);
  };
}

export function createApp(runtime: MemoryRuntime): express.Express {
  const { orchestrator, logger } = runtime;
  const app = express();
  app.use(express.json({ limit: "10mb" }));

  app.post(
    "/api/v1/chat/memory/query",
    asyncHandler(async (req, res) => {
      const body = QueryRequestSchema.parse(req.body);
      const result = await orchestrator.query(body.user_id, body.query, body.time);
      res.json({
        success: true,
        message: "ok",
        user_id: body.user_id,
        user_profile: result.userProfile,
        retrieved_chunks: result.retrievedChunks.map(toWireChunk),
        augmented_context: result.augmentedContext,
        query_time_ms: result.queryTimeMs,
      });
    }),
  );

  app.post(
    "/api/v1/chat/memory/upload",
    asyncHandler(async (req, res) => {
      const body = UploadRequestSchema.parse(req.body);
      const result = await orchestrator.upload(
        body.user_id,
        { messages: body.messages, files: body.multifiles },
        body.time,
      );
      res.json({
        success: true,
        message: "ok",
        user_id: body.user_id,
        chunks_stored: result.chunksStored,
        messages_recorded: result.messagesRecorded,
        profile_updated: result.profileUpdated,
        vector_status: result.vectorStatus,
        process_time_ms: result.processTimeMs,
      });
    }),
  );

  app.get(
    "/api/v1/chat/memory/history/:userId",
    asyncHandler(async (req, res) => {
      const userId = req.params.userId;
      const snapshot = await orchestrator.history(userId);
      res.json({
        success: true,
        user_id: userId,
        window: snapshot.window,
        summary: snapshot.summary ? { text: snapshot.summary.text, generated_at: snapshot.summary.generatedAt } : null,
      });
    }),
  );

  app.get(
    "/health",
    asyncHandler(async (_req, res) => {
      const health = await runtime.health();
      const { background } = health;
      res.json({
        status: health.status,
        version: health.version,
        vector_connected: health.vectorConnected,
        background: {
          queued_tasks: background.queuedTasks,
          compressions: background.history.compressions,
          compression_failures: background.history.compressionFailures,
          pending_compressions: background.history.pendingCompressions,
          profile_updates: background.profile.updated,
          profile_failures: background.profile.failed,
          pending_profile_merges: background.profile.pending,
        },
      });
    }),
  );

  const handleError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
    if (err instanceof ZodError) {
      const message = err.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
      res.status(400).json({ success: false, error: message, code: "INVALID_INPUT" });
      return;
    }
    if (err instanceof MemoryError) {
      if (err.status >= 500) {
        logger.error({ path: req.path, code: err.code, error: err.message }, "request failed");
      }
      res.status(err.status).json({ success: false, error: err.message, code: err.code });
      return;
    }
    const status = clientErrorStatus(err);
    if (status) {
      res.status(status).json({ success: false, error: describeError(err), code: "INVALID_INPUT" });
      return;
    }
    logger.error({ path: req.path, error: describeError(err) }, "unhandled request error");
    res.status(500).json({ success: false, error: "internal server error", code: "INTERNAL" });
  };
  app.use(handleError);

  return app;
}

function toWireChunk(chunk: RetrievedChunk) {
  return {
    content: chunk.content,
    score: chunk.score,
    source: chunk.source,
    metadata: {
      id: chunk.metadata.id,
      user_id: chunk.metadata.tenant,
      timestamp: chunk.metadata.timestamp,
      sequence_index: chunk.metadata.sequenceIndex,
    },
  };
}

/**
 * Body-parser errors carry a 4xx `status`
 */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null || !("status" in err)) return null;
  const status = err.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export type RunningServer = {
  server: Server;
  url: string;
  close(): Promise<void>;
};

export async function startServer(
  runtime: MemoryRuntime,
  options: { host: string; port: number },
): Promise<RunningServer> {
  const server = createServer(createApp(runtime));
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, options.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = isAddressInfo(address) ? address.port : options.port;
  const url = `http://${options.host}:${port}`;
  runtime.logger.info({ url }, "memory service listening");

  return {
    server,
    url,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return typeof value === "object" && value !== null;
}

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import Fastify, { type FastifyInstance } from "fastify";
import rateLimit from "@fastify/rate-limit";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { createContextLogger, logger } from "../utils/logger.js";
import { handleHealthz, handleMetrics, metrics } from "./health.js";
import { correlationIdMiddleware } from "./correlationId.js";
import { createApiKeyAuth, parseApiKeys, rateLimitConfig } from "./middleware.js";
import { handleNormalizeDateRoute, handleVerify } from "./restApi.js";
import {
  handleListVerificationFields,
  handleNormalizeDate,
  handleVerifyIdentityText,
  NORMALIZE_DATE_INPUT,
  VERIFY_IDENTITY_TEXT_INPUT,
} from "./tools/index.js";

declare module 'fastify' {
  interface FastifyRequest {
    startTime?: number;
  }
}

export function createMcpServer(): McpServer {
  const server = new McpServer({
    name: "id-verifier-mcp",
    version: "1.0.0"
  });

  server.tool(
    "list_verification_fields",
    "Lists the verified fields, their match rules and the active thresholds",
    () => handleListVerificationFields()
  );

  server.tool(
    "verify_identity_text",
    "Extracts name, date of birth and 12-digit ID number from OCR text of an identity document and verifies them against a reference record",
    VERIFY_IDENTITY_TEXT_INPUT,
    handleVerifyIdentityText
  );

  server.tool(
    "normalize_date",
    "Parses a free-form date (15/08/1995, 1995-08-15, 15 Aug 1995) into YYYY-MM-DD",
    NORMALIZE_DATE_INPUT,
    handleNormalizeDate
  );

  return server;
}

export interface HttpAppOptions {
  /** Accepted x-api-key values; empty disables the check */
  apiKeys?: string[];
  baseUrl?: string;
}

export async function buildHttpApp(options: HttpAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'x-api-key', 'x-correlation-id'],
  });

  await app.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'ID Verifier API',
        description: 'Extracts identity fields from OCR text and verifies them against a reference record',
        version: '1.0.0',
      },
      servers: [{ url: options.baseUrl ?? 'http://localhost:3000', description: 'API Server' }],
      components: {
        securitySchemes: {
          apiKey: { type: 'apiKey', name: 'x-api-key', in: 'header' },
        },
      },
      security: [{ apiKey: [] }],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: { docExpansion: 'list', deepLinking: false },
  });

  await app.register(rateLimit, rateLimitConfig);

  app.addHook("onRequest", correlationIdMiddleware);

  app.addHook("onRequest", async (request) => {
    request.startTime = Date.now();
    createContextLogger({ corrId: request.corrId }).debug(
      { method: request.method, url: request.url },
      'Incoming request'
    );
  });

  app.addHook("onResponse", async (request, reply) => {
    const duration = (request.startTime ? Date.now() - request.startTime : 0) / 1000;
    const route = request.routeOptions.url ?? request.url.split('?')[0];

    metrics.httpRequestDuration.observe({ method: request.method, route, status: reply.statusCode }, duration);
    metrics.httpRequestTotal.inc({ method: request.method, route, status: reply.statusCode });

    createContextLogger({ corrId: request.corrId }).info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, duration },
      'Request completed'
    );
  });

  app.addHook("preHandler", createApiKeyAuth(options.apiKeys ?? []));

  app.get('/healthz', { schema: { description: 'Liveness check', tags: ['Health'] } }, handleHealthz);
  app.get('/metrics', { schema: { description: 'Prometheus metrics', tags: ['Health'] } }, handleMetrics);

  app.post('/verify', {
    schema: { description: 'Verify OCR text against a reference record', tags: ['Verification'] },
  }, handleVerify);

  app.post('/dates/normalize', {
    schema: { description: 'Normalize a free-form date to YYYY-MM-DD', tags: ['Verification'] },
  }, handleNormalizeDateRoute);

  return app;
}

export async function runServer() {
  if (process.env.MCP_TRANSPORT === "http") {
    const app = await buildHttpApp({
      apiKeys: parseApiKeys(process.env.API_KEYS),
      baseUrl: process.env.API_BASE_URL,
    });
    const port = parseInt(process.env.PORT || "3000", 10);
    const host = process.env.HOST || "0.0.0.0";

    try {
      await app.listen({ port, host });
      logger.info({ port, host }, 'ID verifier HTTP API listening (docs at /docs)');
    } catch (err) {
      logger.error({ err }, 'Failed to start HTTP API');
      process.exit(1);
    }
  } else {
    const server = createMcpServer();
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info('ID verifier MCP server running on stdio');
  }
}

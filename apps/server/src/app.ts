import Fastify, { type FastifyInstance } from "fastify";
import type { AppConfig } from "@scardlens/contracts";
import {
  DEFAULT_CONFIG_PATH,
  PCSC_TABLES,
  StreamCorruptedError,
  TraceFramingError,
  decodeTraceText,
  formatDecodedLine,
  isTableName,
  loadConfig,
  lookup,
  mergeConfig,
  parseHex,
} from "@scardlens/core";

export interface CreateServerOptions {
  config?: AppConfig;
}

interface DecodeRoute {
  Body: string;
  Querystring: { diffable?: string };
}

interface LookupRoute {
  Params: { table: string; code: string };
}

function isTruthyFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

export async function createServer(options: CreateServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? mergeConfig();
  const server = Fastify({ logger: config.server.logger });

  server.get("/api/healthz", async () => ({ ok: true }));

  server.post<DecodeRoute>("/api/decode", async (request, reply) => {
    const body = typeof request.body === "string" ? request.body : "";
    if (!body.trim()) {
      reply.code(400);
      return { error: "expected a text/plain trace body" };
    }

    try {
      const decoded = await decodeTraceText(body, {
        diffable: isTruthyFlag(request.query.diffable),
        maxConsecutiveGarbage: config.demux.maxConsecutiveGarbage,
      });
      return {
        lines: decoded.lines,
        text: decoded.lines.map((line) =>
          formatDecodedLine(line, { color: false, indentWidth: config.output.indentWidth }),
        ),
        report: decoded.report,
      };
    } catch (error) {
      if (error instanceof TraceFramingError || error instanceof StreamCorruptedError) {
        reply.code(400);
        return { error: error.message };
      }
      throw error;
    }
  });

  server.get<LookupRoute>("/api/lookup/:table/:code", async (request, reply) => {
    const { table, code } = request.params;
    if (!isTableName(table)) {
      reply.code(404);
      return { error: `unknown table: ${table}` };
    }
    const value = parseHex(code);
    if (value === null) {
      reply.code(400);
      return { error: `not a hexadecimal code: ${code}` };
    }
    return { table, code: value, name: lookup(PCSC_TABLES[table], value) };
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
}

export async function runServer(options: RunServerOptions = {}): Promise<void> {
  const configPath = options.configPath ?? process.env.SCARDLENS_CONFIG ?? DEFAULT_CONFIG_PATH;
  const config = await loadConfig(configPath);
  const host = options.host ?? process.env.SCARDLENS_HOST ?? config.server.host;
  const port = options.port ?? Number(process.env.SCARDLENS_PORT ?? config.server.port);

  const server = await createServer({ config });
  await server.listen({ host, port });

  process.on("SIGINT", () => {
    server
      .close()
      .then(() => process.exit(0))
      .catch((error) => {
        console.error(error instanceof Error ? error.message : String(error));
        process.exit(1);
      });
  });

  // eslint-disable-next-line no-console
  console.log(`scardlens server: http://${host}:${port}`);
}

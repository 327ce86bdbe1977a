/*
 * agri-mcp.ts
 *
 * JSON-RPC 2.0 tool server over the rainfall / crop production question answerer.
 *   POST /mcp            { id, method: "tools/list" | "tools/call", params }
 *   GET  /mcp/:toolName  query-string arguments (see registerGetWrapper.ts)
 */

import express from 'express';
import type { Express } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { registerGetWrapper, zodMessage } from './registerGetWrapper.js';
import type { Tool } from './registerGetWrapper.js';
import type { QaService } from './src/openqa/answer_open_question.js';
import { ols, pearsonR, pvalFromR } from './src/openqa/stats.js';

type RpcId = string | number | null;
type RpcResponse =
  | { jsonrpc: '2.0'; id: RpcId; result: unknown }
  | { jsonrpc: '2.0'; id: RpcId; error: { code: number; message: string; data?: unknown } };

function ok(id: RpcId, result: unknown): RpcResponse { return { jsonrpc: '2.0', id, result }; }
function err(id: RpcId, code: number, message: string, data?: unknown): RpcResponse {
  return { jsonrpc: '2.0', id, error: data === undefined ? { code, message } : { code, message, data } };
}

// -------- Schemas --------
const Question = z.object({ question: z.string().trim().min(1, 'question is required') });
const NoArgs = z.object({}).strict();
const StatsArrayPair = z.object({
  x: z.array(z.number()).min(2),
  y: z.array(z.number()).min(2),
}).refine(p => p.x.length === p.y.length, { message: 'x and y must have the same length' });

const RpcRequest = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.string(), z.number()]),
  method: z.string().min(1),
  params: z.object({
    name: z.string().optional(),
    arguments: z.unknown().optional(),
  }).passthrough().optional(),
});

// -------- Tools --------
export function createTools(service: QaService): Tool[] {
  const tools: Tool[] = [];

  tools.push({
    name: 'qa.answer',
    description: 'Answer a natural-language question about rainfall and crop production, with citations.',
    inputSchema: Question,
    handler: async (input) => {
      const p = Question.parse(input);
      return service.answer(p.question);
    },
  });

  tools.push({
    name: 'qa.parse',
    description: 'Show how a question is split into sub-questions and which intent each one resolves to.',
    inputSchema: Question,
    handler: async (input) => {
      const p = Question.parse(input);
      return service.parse(p.question);
    },
  });

  tools.push({
    name: 'dataset.summary',
    description: 'Harmonized dataset coverage: years per metric, record counts and the build report.',
    inputSchema: NoArgs,
    handler: async (input) => {
      NoArgs.parse(input ?? {});
      return service.summary();
    },
  });

  tools.push({
    name: 'dataset.reload',
    description: 'Rebuild the harmonized dataset from the raw files.',
    inputSchema: NoArgs,
    handler: async (input) => {
      NoArgs.parse(input ?? {});
      return service.reload();
    },
  });

  // stats.pearson: r, approximate p, n
  tools.push({
    name: 'stats.pearson',
    description: 'Pearson correlation r between two numeric arrays; also returns approx two-tailed p (Fisher z).',
    inputSchema: StatsArrayPair,
    handler: async (input) => {
      const p = StatsArrayPair.parse(input);
      const { r, n } = pearsonR(p.x, p.y);
      return { r, n, p_value_two_tailed: pvalFromR(r, n) };
    },
  });

  // stats.linear_regression: OLS y = a + b x
  tools.push({
    name: 'stats.linear_regression',
    description: 'Simple linear regression (y = intercept + slope * x). Returns slope, intercept, r, r2.',
    inputSchema: StatsArrayPair,
    handler: async (input) => {
      const p = StatsArrayPair.parse(input);
      return ols(p.x, p.y);
    },
  });

  return tools;
}

// -------- JSON-RPC dispatch --------
export async function handleRpc(tools: Tool[], body: unknown): Promise<{ status: number; body: RpcResponse }> {
  const req = RpcRequest.safeParse(body);
  if (!req.success) return { status: 400, body: err(null, -32600, 'Invalid Request', zodMessage(req.error)) };
  const { id, method, params } = req.data;

  if (method === 'tools/list') {
    return {
      status: 200,
      body: ok(id, {
        tools: tools.map(t => ({ name: t.name, description: t.description, inputSchema: zodToJsonSchema(t.inputSchema) })),
      }),
    };
  }

  if (method === 'tools/call') {
    const name = params?.name;
    const tool = tools.find(t => t.name === name);
    if (!tool) return { status: 200, body: err(id, -32601, `Unknown tool: ${name ?? '(missing name)'}`) };
    try {
      const result = await tool.handler(params?.arguments ?? {});
      return { status: 200, body: ok(id, { content: result }) };
    } catch (e: unknown) {
      if (e instanceof z.ZodError) return { status: 200, body: err(id, -32602, `Invalid params: ${zodMessage(e)}`) };
      console.error(`[agri-mcp] ${tool.name} failed:`, e);
      return { status: 200, body: err(id, -32000, e instanceof Error ? e.message : 'Tool error') };
    }
  }

  return { status: 200, body: err(id, -32601, `Method not found: ${method}`) };
}

// -------- HTTP app --------
export function createApp(service: QaService): Express {
  const tools = createTools(service);
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: '2mb' }));

  app.post('/mcp', async (req, res) => {
    try {
      const out = await handleRpc(tools, req.body);
      res.status(out.status).json(out.body);
    } catch (e: unknown) {
      res.status(500).json(err(null, -32603, 'Internal error', { message: e instanceof Error ? e.message : String(e) }));
    }
  });
  registerGetWrapper(app, tools);
  return app;
}

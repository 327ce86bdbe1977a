/*
 * registerGetWrapper.ts
 *
 * Adds a REST-style GET route, `/mcp/:toolName`, next to the JSON-RPC endpoint.
 * Query parameters are coerced (numbers, booleans, arrays via comma-separated
 * values or `[]` suffixes) and handed to the tool, which validates them against
 * its zod schema.
 *
 * Usage:
 *   registerGetWrapper(app, tools);
 *   // http://localhost:8788/mcp/qa.answer?question=Top%205%20crops%20in%20Punjab
 *   // http://localhost:8788/mcp/stats.pearson?x=1,2,3&y=2,4,7
 */

import type { Express, Request, Response } from 'express';
import { z } from 'zod';

export type Tool = {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  handler: (args: unknown) => Promise<unknown>;
};

// Handlers that take free text ask for these keys verbatim
const TEXT_KEYS = new Set(['question']);

export function coerceValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(coerceValue);
  }
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  if (trimmed.includes(',')) {
    return trimmed.split(',').map(v => coerceValue(v));
  }
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }
  if (trimmed.toLowerCase() === 'true') return true;
  if (trimmed.toLowerCase() === 'false') return false;
  return trimmed;
}

/** Express `req.query` → tool arguments. Keys ending with [] always become arrays. */
export function parseQuery(query: Request['query']): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    if (key.endsWith('[]')) {
      const coerced = coerceValue(value);
      result[key.slice(0, -2)] = Array.isArray(coerced) ? coerced : [coerced];
    } else if (TEXT_KEYS.has(key)) {
      result[key] = Array.isArray(value) ? value.join(' ') : value;
    } else {
      result[key] = coerceValue(value);
    }
  }
  return result;
}

export function zodMessage(e: z.ZodError): string {
  return e.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');
}

/**
 * Register a GET route on the Express app to call tools by name.
 * Validation failures → 400, unknown tool → 404, anything else → 500.
 */
export function registerGetWrapper(app: Express, tools: Tool[]): void {
  app.get('/mcp/:toolName', async (req: Request, res: Response) => {
    const { toolName } = req.params;
    const tool = tools.find(t => t.name === toolName);
    if (!tool) {
      res.status(404).json({ error: `Unknown tool: ${toolName}` });
      return;
    }
    try {
      const result = await tool.handler(parseQuery(req.query));
      res.json(result);
    } catch (e: unknown) {
      if (e instanceof z.ZodError) {
        res.status(400).json({ error: zodMessage(e) });
        return;
      }
      console.error(`[agri-mcp] GET ${toolName} failed:`, e);
      res.status(500).json({ error: e instanceof Error ? e.message : 'Tool error' });
    }
  });
}

// packages/core/src/types/mcp.ts — MCP tool input schemas

import { z } from 'zod';

export const analyzeInputSchema = z.object({
  mode: z.enum(['deprecated-controllers', 'marked-files']).default('deprecated-controllers'),
  files: z.array(z.string().min(1)).optional(),
});

export const cleanupInputSchema = z.object({
  mode: z.enum(['deprecated-controllers', 'marked-files']),
  files: z.array(z.string().min(1)).optional(),
  confirm: z.boolean().default(false),
});

export const markInputSchema = z.object({
  action: z.enum(['mark', 'unmark', 'list']),
  files: z.array(z.string().min(1)).default([]),
});

export type AnalyzeInput = z.infer<typeof analyzeInputSchema>;
export type CleanupInput = z.infer<typeof cleanupInputSchema>;
export type MarkInput = z.infer<typeof markInputSchema>;

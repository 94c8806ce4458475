// packages/mcp-server/src/server.ts — MCP server setup with analyze, cleanup and mark tools

import { join } from 'node:path';
import {
  CONFIG_FILENAME,
  RunStore,
  STATE_DIR,
  VERSION,
  createLogger,
  errorMessage,
  loadConfig,
  openDatabase,
  openProject,
} from '@sweeper/core';
import type { Project } from '@sweeper/core';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { mkdirSync } from 'node:fs';
import { handleAnalyze, handleCleanup, handleMark } from './tools/index.js';

const MODE_PROPERTY = {
  type: 'string',
  enum: ['deprecated-controllers', 'marked-files'],
  description:
    'deprecated-controllers: unused deprecated controller methods and the methods only they call. ' +
    'marked-files: unused imports, fields and classes in files carrying the scope marker.',
};

const FILES_PROPERTY = {
  type: 'array',
  items: { type: 'string', minLength: 1 },
  description: 'Project-relative Java files to search for deprecated methods (deprecated-controllers only)',
};

export const TOOL_DEFINITIONS = [
  {
    name: 'sweeper_analyze',
    description: 'Report what a cleanup would remove, without changing any file.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        mode: { ...MODE_PROPERTY, default: 'deprecated-controllers' },
        files: FILES_PROPERTY,
      },
    },
  },
  {
    name: 'sweeper_cleanup',
    description:
      'Remove dead code in up to three passes. Without confirm: true only a preview is returned; ' +
      'show it to the user before confirming.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        mode: MODE_PROPERTY,
        files: FILES_PROPERTY,
        confirm: { type: 'boolean', description: 'Apply the removals', default: false },
      },
      required: ['mode'],
    },
  },
  {
    name: 'sweeper_mark',
    description: `Add, remove or list the scope marker comment (see marker in ${CONFIG_FILENAME}).`,
    inputSchema: {
      type: 'object' as const,
      properties: {
        action: { type: 'string', enum: ['mark', 'unmark', 'list'], description: 'Marker operation' },
        files: { type: 'array', items: { type: 'string', minLength: 1 }, description: 'Project-relative Java files' },
      },
      required: ['action'],
    },
  },
];

/** Dispatch one tool call. Handler errors become `isError` results. */
export async function callTool(project: Project, runStore: RunStore, toolName: string, args: unknown) {
  try {
    switch (toolName) {
      case 'sweeper_analyze':
        return await handleAnalyze(project, args);
      case 'sweeper_cleanup':
        return await handleCleanup(project, runStore, args);
      case 'sweeper_mark':
        return await handleMark(project, args);
      default:
        return {
          content: [{ type: 'text' as const, text: `Unknown tool: ${toolName}` }],
          isError: true,
        };
    }
  } catch (err) {
    return {
      content: [{ type: 'text' as const, text: `Error: ${errorMessage(err)}` }],
      isError: true,
    };
  }
}

export async function startServer(): Promise<void> {
  const projectDir = process.env.SWEEPER_PROJECT_DIR ?? process.cwd();
  const config = loadConfig({ projectDir });
  // stdout carries the protocol; the logger writes to stderr
  const project = openProject({ projectDir, logger: createLogger(config.logLevel) });

  const defaultDbDir = join(project.projectDir, STATE_DIR, 'db');
  const dbPath = process.env.SWEEPER_DB_PATH ?? join(defaultDbDir, 'sweeper.db');
  if (!process.env.SWEEPER_DB_PATH) mkdirSync(defaultDbDir, { recursive: true });
  const db = openDatabase(dbPath);
  const runStore = new RunStore(db);

  const server = new Server({ name: 'sweeper', version: VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return callTool(project, runStore, request.params.name, request.params.arguments ?? {});
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = () => {
    db.close();
    process.exit(0);
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);

  console.error(`sweeper MCP server started for ${project.projectDir}`);
}

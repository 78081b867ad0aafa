#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
  type ServerNotification,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import dotenv from 'dotenv';
import express from 'express';
import type { Server as HttpServer } from 'http';
import { join } from 'path';
import { z, ZodError, type ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { AnalysisOrchestrator } from './analysis/orchestrator';
import { ANALYSIS_PROMPT, HYPOTHESIS_PROMPT, SUMMARY_PROMPT, SYNTHESIS_PROMPT } from './analysis/prompts';
import { DatasetLoader, SUPPORTED_EXTENSIONS } from './data/datasetLoader';
import { CodeSandbox } from './sandbox/sandbox';
import { SessionStore } from './session/sessionStore';
import { errorNext, type ErrorCode as HypoForgeErrorCode, type ErrorResponse, type NextAction, type SessionRecord } from './types';
import { AuditTrail, generateAuditId } from './utils/audit';
import { CompletionClient, createCompletionHttp, type CompletionOverrides } from './utils/completionClient';
import { loadConfig, type HypoForgeConfig } from './utils/config';
import { HypoForgeError, StageFailedError, UpstreamError, errorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

import type { LlmOverridesT, SessionSummaryT } from './schemas/common';
import { HYPOTHESES_RESPONSE_FORMAT } from './schemas/completion';
import { CleanupSessionsInput, CleanupSessionsOutput } from './schemas/cleanupSessions';
import { DeleteSessionInput, DeleteSessionOutput } from './schemas/deleteSession';
import { ExecuteTestInput, ExecuteTestOutput } from './schemas/executeTest';
import { GenerateHypothesesInput, GenerateHypothesesOutput } from './schemas/generateHypotheses';
import { GetSessionInput, GetSessionOutput } from './schemas/getSession';
import { LoadDataInput, LoadDataOutput } from './schemas/loadData';
import { SynthesizeInput, SynthesizeOutput } from './schemas/synthesize';
import { TestHypothesisInput, TestHypothesisOutput } from './schemas/testHypothesis';
import { UploadDataInput, UploadDataOutput } from './schemas/uploadData';

const logger = createLogger('HypoForgeMCPServer');

const HOUR_MS = 60 * 60 * 1000;

export interface ServerContext {
  config: HypoForgeConfig;
  store: SessionStore;
  loader: DatasetLoader;
  sandbox: CodeSandbox;
  completion: CompletionClient;
  audit: AuditTrail;
}

interface CallContext {
  auditId: string;
  signal: AbortSignal;
  progress: (payload: unknown) => Promise<void>;
  streaming: boolean;
}

interface ToolDefinition {
  name: string;
  description: string;
  input: ZodTypeAny;
}

const TOOLS: ToolDefinition[] = [
  {
    name: 'hypoforge_load_data',
    description: `Load a dataset from a local path or http(s) URL into a new session (${SUPPORTED_EXTENSIONS.join(', ')})`,
    input: LoadDataInput,
  },
  {
    name: 'hypoforge_upload_data',
    description: 'Create a session from uploaded file content (utf8 text or base64)',
    input: UploadDataInput,
  },
  {
    name: 'hypoforge_get_session',
    description: 'Get the description and metadata of a session',
    input: GetSessionInput,
  },
  {
    name: 'hypoforge_delete_session',
    description: 'Delete a session and its dataset snapshot',
    input: DeleteSessionInput,
  },
  {
    name: 'hypoforge_cleanup_sessions',
    description: 'Delete every session at least max_age_hours old',
    input: CleanupSessionsInput,
  },
  {
    name: 'hypoforge_execute_test',
    description: 'Run analysis code defining testHypothesis(df) against a session dataset',
    input: ExecuteTestInput,
  },
  {
    name: 'hypoforge_generate_hypotheses',
    description: 'Ask the completion service for testable hypotheses about a session dataset',
    input: GenerateHypothesesInput,
  },
  {
    name: 'hypoforge_test_hypothesis',
    description: 'Generate analysis code for a hypothesis, run it, and summarize the result',
    input: TestHypothesisInput,
  },
  {
    name: 'hypoforge_synthesize',
    description: 'Summarize tested hypotheses into key takeaways and actions',
    input: SynthesizeInput,
  },
];

const JsonObjectSchema = z
  .object({
    properties: z.record(z.unknown()).default({}),
    required: z.array(z.string()).optional(),
  })
  .passthrough();

function toolInputSchema(schema: ZodTypeAny): Tool['inputSchema'] {
  const json = JsonObjectSchema.parse(zodToJsonSchema(schema, { target: 'jsonSchema7', $refStrategy: 'none' }));
  return { ...json, type: 'object' };
}

function toOverrides(llm: LlmOverridesT): CompletionOverrides {
  return {
    apiBaseUrl: llm?.api_base_url,
    apiKey: llm?.api_key,
    modelName: llm?.model_name,
  };
}

function sessionSummary(record: SessionRecord, auditId: string): SessionSummaryT {
  return {
    session_id: record.sessionId,
    description: record.description,
    row_count: record.rowCount,
    column_count: record.columnCount,
    audit_id: auditId,
  };
}

function sessionIdOf(args: unknown): string | undefined {
  const parsed = z.object({ session_id: z.string() }).safeParse(args);
  return parsed.success ? parsed.data.session_id : undefined;
}

function nextActions(code: HypoForgeErrorCode, args: unknown): NextAction[] {
  const sessionId = sessionIdOf(args);
  switch (code) {
    case 'NOT_FOUND':
      return [{ tool: 'hypoforge_load_data', args: { source: '<path or URL>' } }];
    case 'EXECUTION_ERROR':
      return sessionId ? [{ tool: 'hypoforge_get_session', args: { session_id: sessionId } }] : [];
    default:
      return [];
  }
}

/**
 * Map a tool failure onto the structured error response.
 */
export function toErrorResponse(error: unknown, args: unknown, auditId: string): ErrorResponse {
  if (!(error instanceof HypoForgeError)) {
    return errorNext('INTERNAL_ERROR', 500, errorMessage(error), [], auditId);
  }
  const response = errorNext(error.code, error.status, error.message, nextActions(error.code, args), auditId);
  if (error instanceof UpstreamError) {
    response.upstream = { status: error.upstreamStatus, body: error.body };
  }
  if (error instanceof StageFailedError) {
    response.failed_stage = error.failedStage;
    response.upstream = error.upstream;
  }
  return response;
}

function jsonResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * MCP server exposing dataset sessions, sandboxed hypothesis tests and
 * completion-backed workflows.
 */
export class HypoForgeMCPServer {
  private readonly orchestrator: AnalysisOrchestrator;
  private sweepTimer?: NodeJS.Timeout;
  private httpServer?: HttpServer;

  constructor(private readonly context: ServerContext) {
    this.orchestrator = new AnalysisOrchestrator(context.store, context.sandbox);
  }

  static async create(config: HypoForgeConfig): Promise<HypoForgeMCPServer> {
    const store = await SessionStore.open(config.storageDir);
    return new HypoForgeMCPServer({
      config,
      store,
      loader: new DatasetLoader({ stagingDir: join(store.directory, 'staging') }),
      sandbox: new CodeSandbox(config.sandbox),
      completion: new CompletionClient(
        {
          apiBaseUrl: config.llm.apiBaseUrl,
          apiKey: config.llm.apiKey,
          modelName: config.llm.modelName,
          temperature: config.llm.temperature,
        },
        createCompletionHttp(config.llm.timeoutMs)
      ),
      audit: new AuditTrail(config.auditLogFile),
    });
  }

  /**
   * Build an MCP server bound to this instance. `requestSignal` aborts every
   * call handled by it, e.g. when an HTTP client disconnects.
   */
  createServer(requestSignal?: AbortSignal): Server {
    const { config } = this.context;
    const server = new Server(
      {
        name: 'hypoforge-mcp-server',
        version: config.version,
      },
      {
        capabilities: {
          resources: {},
          tools: {},
        },
      }
    );

    server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOLS.map(({ name, description, input }) => ({
        name,
        description,
        inputSchema: toolInputSchema(input),
      })),
    }));

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      const { name: toolName, arguments: args } = request.params;
      const progressToken = request.params._meta?.progressToken;
      const auditId = generateAuditId();
      const audit = this.context.audit.begin(toolName, args, auditId);
      const signal = requestSignal ? AbortSignal.any([extra.signal, requestSignal]) : extra.signal;

      let progress = 0;
      const sendProgress = async (payload: unknown): Promise<void> => {
        if (progressToken === undefined) {
          return;
        }
        progress += 1;
        const notification: ServerNotification = {
          method: 'notifications/progress',
          params: { progressToken, progress, message: JSON.stringify(payload) },
        };
        await extra.sendNotification(notification);
      };

      logger.info(`Executing tool: ${toolName}`);
      try {
        const result = await this.executeTool(toolName, args, {
          auditId,
          signal,
          progress: sendProgress,
          streaming: progressToken !== undefined,
        });
        audit.logSuccess(sessionIdOf(result) ?? sessionIdOf(args));
        logger.info(`Tool ${toolName} executed successfully`);
        return jsonResult(result);
      } catch (error) {
        audit.logError(errorMessage(error), sessionIdOf(args));
        if (error instanceof McpError) {
          throw error;
        }
        if (signal.aborted) {
          logger.info(`Tool ${toolName} cancelled`);
          throw error;
        }
        logger.error(`Error executing tool ${toolName}:`, errorMessage(error));
        return jsonResult(toErrorResponse(error, args, auditId), true);
      }
    });

    server.setRequestHandler(ListResourcesRequestSchema, async () => ({
      resources: [
        {
          uri: 'hypoforge://status',
          name: 'HypoForge Status',
          description: 'Server info, active sessions and defaults',
          mimeType: 'application/json',
        },
        {
          uri: 'hypoforge://prompts',
          name: 'HypoForge Prompts',
          description: 'Default prompts and the hypotheses response schema',
          mimeType: 'application/json',
        },
      ],
    }));

    server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;
      logger.info(`Reading resource: ${uri}`);
      return {
        contents: [
          {
            uri,
            mimeType: 'application/json',
            text: JSON.stringify(this.readResource(uri), null, 2),
          },
        ],
      };
    });

    return server;
  }

  private parseArgs<T extends ZodTypeAny>(schema: T, args: unknown): z.infer<T> {
    try {
      return schema.parse(args ?? {});
    } catch (error) {
      if (error instanceof ZodError) {
        const details = error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`);
        throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${details.join('; ')}`);
      }
      throw error;
    }
  }

  private async executeTool(toolName: string, args: unknown, call: CallContext): Promise<unknown> {
    switch (toolName) {
      case 'hypoforge_load_data':
        return this.loadData(this.parseArgs(LoadDataInput, args), call);
      case 'hypoforge_upload_data':
        return this.uploadData(this.parseArgs(UploadDataInput, args), call);
      case 'hypoforge_get_session':
        return this.getSession(this.parseArgs(GetSessionInput, args), call);
      case 'hypoforge_delete_session':
        return this.deleteSession(this.parseArgs(DeleteSessionInput, args), call);
      case 'hypoforge_cleanup_sessions':
        return this.cleanupSessions(this.parseArgs(CleanupSessionsInput, args), call);
      case 'hypoforge_execute_test':
        return this.executeTest(this.parseArgs(ExecuteTestInput, args), call);
      case 'hypoforge_generate_hypotheses':
        return this.generateHypotheses(this.parseArgs(GenerateHypothesesInput, args), call);
      case 'hypoforge_test_hypothesis':
        return this.testHypothesis(this.parseArgs(TestHypothesisInput, args), call);
      case 'hypoforge_synthesize':
        return this.synthesize(this.parseArgs(SynthesizeInput, args), call);
      default:
        throw new McpError(ErrorCode.InvalidParams, `Unknown tool: ${toolName}`);
    }
  }

  // Tool implementations
  private async loadData(args: z.infer<typeof LoadDataInput>, call: CallContext) {
    const dataset = await this.context.loader.load(args.source, call.signal);
    const record = await this.context.store.create(dataset, args.source);
    return LoadDataOutput.parse(sessionSummary(record, call.auditId));
  }

  private async uploadData(args: z.infer<typeof UploadDataInput>, call: CallContext) {
    const bytes = Buffer.from(args.content, args.encoding === 'base64' ? 'base64' : 'utf8');
    const dataset = await this.context.loader.loadUpload(args.filename, bytes);
    const record = await this.context.store.create(dataset, `upload:${args.filename}`);
    return UploadDataOutput.parse(sessionSummary(record, call.auditId));
  }

  private async getSession(args: z.infer<typeof GetSessionInput>, call: CallContext) {
    const record = await this.context.store.get(args.session_id);
    return GetSessionOutput.parse({
      session_id: record.sessionId,
      description: record.description,
      row_count: record.rowCount,
      column_count: record.columnCount,
      source: record.source,
      created_at: new Date(record.createdAt).toISOString(),
      audit_id: call.auditId,
    });
  }

  private async deleteSession(args: z.infer<typeof DeleteSessionInput>, call: CallContext) {
    await this.context.store.delete(args.session_id);
    return DeleteSessionOutput.parse({ message: `Session ${args.session_id} deleted`, audit_id: call.auditId });
  }

  private async cleanupSessions(args: z.infer<typeof CleanupSessionsInput>, call: CallContext) {
    const maxAgeHours = args.max_age_hours ?? this.context.config.maxAgeHours;
    const removed = await this.context.store.sweep(maxAgeHours * HOUR_MS);
    return CleanupSessionsOutput.parse({
      message: `Cleaned up ${removed} old sessions`,
      removed,
      audit_id: call.auditId,
    });
  }

  private async executeTest(args: z.infer<typeof ExecuteTestInput>, call: CallContext) {
    const outcome = await this.orchestrator.executeTest(args.session_id, args.analysis_code);
    return ExecuteTestOutput.parse({ success: outcome.success, p_value: outcome.pValue, audit_id: call.auditId });
  }

  private async generateHypotheses(args: z.infer<typeof GenerateHypothesesInput>, call: CallContext) {
    const gateway = this.context.completion.withOverrides(toOverrides(args.llm));
    for await (const event of this.orchestrator.generateHypotheses(args.session_id, gateway, {
      systemPrompt: args.system_prompt,
      signal: call.signal,
      streaming: call.streaming,
    })) {
      await call.progress(event);
      if (event.type === 'complete') {
        return GenerateHypothesesOutput.parse({ hypotheses: event.result, audit_id: call.auditId });
      }
    }
    throw new HypoForgeError('INTERNAL_ERROR', 500, 'Hypothesis generation ended without a result');
  }

  private async testHypothesis(args: z.infer<typeof TestHypothesisInput>, call: CallContext) {
    const gateway = this.context.completion.withOverrides(toOverrides(args.llm));
    for await (const event of this.orchestrator.testHypothesis(args.session_id, args.hypothesis, gateway, {
      analysisPrompt: args.analysis_prompt,
      signal: call.signal,
    })) {
      await call.progress(event);
      if (event.stage === 'Done') {
        return TestHypothesisOutput.parse({ ...event, audit_id: call.auditId });
      }
      if (event.stage === 'Failed') {
        const { error } = event;
        throw new StageFailedError(event.failed_stage, error.error, error.status, error.message, error.upstream);
      }
    }
    throw new HypoForgeError('INTERNAL_ERROR', 500, 'Hypothesis test ended without a result');
  }

  private async synthesize(args: z.infer<typeof SynthesizeInput>, call: CallContext) {
    const gateway = this.context.completion.withOverrides(toOverrides(args.llm));
    for await (const event of this.orchestrator.synthesize(args.hypotheses, gateway, {
      signal: call.signal,
      streaming: call.streaming,
    })) {
      await call.progress(event);
      if (event.type === 'complete') {
        return SynthesizeOutput.parse({ synthesis: event.result, audit_id: call.auditId });
      }
    }
    throw new HypoForgeError('INTERNAL_ERROR', 500, 'Synthesis ended without a result');
  }

  // Resource implementations
  private readResource(uri: string): unknown {
    const { config, store } = this.context;
    switch (uri) {
      case 'hypoforge://status':
        return {
          server: config.title,
          version: config.version,
          timestamp: new Date().toISOString(),
          transport: config.transport,
          active_sessions: store.size,
          supported_formats: SUPPORTED_EXTENSIONS,
          defaults: {
            max_age_hours: config.maxAgeHours,
            api_base_url: config.llm.apiBaseUrl,
            model_name: config.llm.modelName,
            temperature: config.llm.temperature,
            api_key_configured: config.llm.apiKey !== undefined,
            sandbox_timeout_ms: config.sandbox.timeoutMs,
            sandbox_memory_mb: config.sandbox.memoryMb,
          },
          tools_count: TOOLS.length,
        };
      case 'hypoforge://prompts':
        return {
          hypothesis: HYPOTHESIS_PROMPT,
          analysis: ANALYSIS_PROMPT,
          summary: SUMMARY_PROMPT,
          synthesis: SYNTHESIS_PROMPT,
          hypotheses_schema: HYPOTHESES_RESPONSE_FORMAT,
        };
      default:
        throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }
  }

  /**
   * Sweep sessions older than the configured max age on a fixed interval.
   */
  startSweeper(): void {
    const { maxAgeHours, sweepIntervalMinutes } = this.context.config;
    this.sweepTimer = setInterval(() => {
      this.context.store.sweep(maxAgeHours * HOUR_MS).catch((error: unknown) => {
        logger.error('Periodic session cleanup failed:', error);
      });
    }, sweepIntervalMinutes * 60 * 1000);
    this.sweepTimer.unref();
  }

  async startStdio(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.createServer().connect(transport);
    logger.info('HypoForge MCP Server started on stdio');
  }

  async startHttp(): Promise<HttpServer> {
    const { host, port } = this.context.config;
    const app = express();
    app.use(express.json({ limit: '50mb' }));

    // Stateless Streamable HTTP: one server and transport per request
    app.post('/mcp', async (req, res) => {
      const controller = new AbortController();
      const server = this.createServer(controller.signal);
      const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
      res.on('close', () => {
        controller.abort();
        Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
          logger.warn('Failed to close MCP request transport:', error);
        });
      });

      try {
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
      } catch (error) {
        logger.error('Error handling MCP request:', error);
        if (!res.headersSent) {
          res.status(500).json({
            jsonrpc: '2.0',
            error: { code: ErrorCode.InternalError, message: 'Internal server error' },
            id: null,
          });
        }
      }
    });

    const methodNotAllowed = (_req: express.Request, res: express.Response): void => {
      res.status(405).json({
        jsonrpc: '2.0',
        error: { code: ErrorCode.ConnectionClosed, message: 'Method not allowed.' },
        id: null,
      });
    };
    app.get('/mcp', methodNotAllowed);
    app.delete('/mcp', methodNotAllowed);

    return new Promise<HttpServer>((resolve, reject) => {
      const httpServer = app.listen(port, host, () => {
        logger.info(`HypoForge MCP Server listening on http://${host}:${port}/mcp`);
        resolve(httpServer);
      });
      httpServer.on('error', reject);
      this.httpServer = httpServer;
    });
  }

  async stop(): Promise<void> {
    logger.info('Stopping HypoForge MCP Server...');
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
    }
    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    }
    await this.context.store.dispose();
  }
}

// Main execution
async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const server = await HypoForgeMCPServer.create(config);

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to stop server cleanly:', error);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  server.startSweeper();
  if (config.transport === 'http') {
    await server.startHttp();
  } else {
    await server.startStdio();
  }
}

// Run the server
if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
  });
}

export default HypoForgeMCPServer;

import { join } from 'path';
import type { ConversationMessage, LLMProvider } from '../llm/types.js';
import { createProvider } from '../llm/factory.js';
import { ToolRunner } from '../tools/runner.js';
import { createBuiltinTools } from '../tools/native/index.js';
import type { ExternalToolSource } from '../tools/types.js';
import { withMCPServers } from '../mcp/client.js';
import type { MCPConnectors } from '../mcp/types.js';
import { loadEnv, resolveWorkingDir, type Environment } from '../config/env.js';
import { getDataDir, getEnvFilePath } from '../config/paths.js';
import { RunLogger } from '../logging/run-log.js';
import { errorMessage } from '../utils/errors.js';
import { isDebugEnabled } from '../utils/debug.js';
import { abortable } from '../utils/abort.js';
import { runConversation, type ConversationOutcome } from './conversation.js';
import { PLAIN_SYSTEM_PROMPT, buildPrompt, buildToolSystemPrompt } from './prompt.js';

export interface ExecuteSkillOptions {
  /** Raw SKILL.md instructions */
  skillBody: string;
  workingDir: string;
  /** Skill name recorded in the run log */
  skillName?: string;
  /** Directory with the skill's helper scripts; cwd for run_command */
  companionDir?: string;
  /** MCP server declaration file */
  mcpConfig?: string;
  userRequest?: string;
  /** Process environment merged with the .env override file when omitted */
  env?: Environment;
  /** Receives streamed text; stdout by default */
  output?: (text: string) => void;
  /** Overrides provider selection from the environment */
  provider?: LLMProvider;
  mcpConnectors?: MCPConnectors;
  runLogger?: RunLogger;
  maxRounds?: number;
  commandTimeoutMs?: number;
  now?: Date;
  /**
   * Interrupts the run: the current command is killed, no further model or
   * tool call starts, and external connections are closed before the
   * returned promise rejects.
   */
  signal?: AbortSignal;
}

export interface ExecuteSkillResult extends ConversationOutcome {
  runId: string;
  durationMs: number;
}

/**
 * Run one skill to completion. Setup failures (credentials, MCP connect)
 * throw before the model is called; external connections are closed on
 * every exit path.
 */
export async function executeSkill(options: ExecuteSkillOptions): Promise<ExecuteSkillResult> {
  const env = options.env ?? loadEnv(getEnvFilePath());
  const workingDir = resolveWorkingDir(options.workingDir, { create: true });
  const provider = options.provider ?? createProvider(env);
  const logger = options.runLogger ?? new RunLogger(join(getDataDir(env), 'logs'));
  const output = options.output ?? ((text: string) => {
    process.stdout.write(text);
  });

  const messages: ConversationMessage[] = [
    { role: 'user', content: buildPrompt(options.skillBody, options.userRequest, options.now) },
  ];

  const startTime = Date.now();
  let toolCallCount = 0;

  logger.skillStart({
    skill: options.skillName ?? '',
    provider: provider.name,
    model: provider.model,
    hasMcp: Boolean(options.mcpConfig),
  });

  const run = async (external: ExternalToolSource | null): Promise<ConversationOutcome> => {
    const toolRunner = new ToolRunner({
      nativeTools: createBuiltinTools({
        workingDir,
        companionDir: options.companionDir,
        timeoutMs: options.commandTimeoutMs,
        env,
        signal: options.signal,
      }),
      external,
    });

    const unsubscribe = toolRunner.onToolEvent((event) => {
      if (event.type === 'tool_requested') {
        if (isDebugEnabled(env)) {
          console.error(`[Executor] Tool: ${event.toolName}`, event.arguments);
        }
        return;
      }
      toolCallCount++;
      logger.toolCall(event.toolName, event.isError);
    });

    const conversation = runConversation(messages, {
      provider,
      toolRunner,
      systemPrompt: buildToolSystemPrompt(workingDir, Boolean(options.companionDir)),
      plainSystemPrompt: PLAIN_SYSTEM_PROMPT,
      onText: output,
      maxRounds: options.maxRounds,
      signal: options.signal,
    });

    try {
      // A model call can block on the network; stop waiting for it on interrupt
      return await abortable(conversation, options.signal);
    } finally {
      unsubscribe();
    }
  };

  let outcome: ConversationOutcome;
  try {
    outcome = options.mcpConfig
      ? await withMCPServers(options.mcpConfig, env, run, options.mcpConnectors)
      : await run(null);
  } catch (error) {
    logger.skillEnd({
      durationS: (Date.now() - startTime) / 1000,
      rounds: messages.filter((m) => m.role === 'assistant').length,
      toolCalls: toolCallCount,
      truncated: false,
      error: errorMessage(error),
      messages,
    });
    throw error;
  }

  const durationMs = Date.now() - startTime;
  logger.skillEnd({
    durationS: durationMs / 1000,
    rounds: outcome.rounds,
    toolCalls: outcome.toolCalls,
    truncated: outcome.truncated,
    error: null,
    messages,
  });

  return { ...outcome, runId: logger.runId, durationMs };
}

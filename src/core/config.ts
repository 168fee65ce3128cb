import fs from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import type { Config, AgentConfig } from '../types/config.js';
import { configPath } from '../lib/paths.js';
import { AgentNotFoundError, ConfigError } from '../lib/errors.js';

export const BUILTIN_AGENT = 'headless-claude-code';

const BUILTIN_AGENTS: Record<string, AgentConfig> = {
  [BUILTIN_AGENT]: {
    name: BUILTIN_AGENT,
    command: 'claude',
    args: ['-p', '--output-format', 'json', '{{PROMPT}}'],
    resumeArgs: ['-p', '--output-format', 'json', '--resume', '{{SESSION_ID}}', '{{PROMPT}}'],
  },
};

const DEFAULT_CONFIG: Config = {
  watchInterval: 5,
  sessionCaptureMs: 3000,
  agents: {},
};

const AgentEntrySchema = z.object({
  name: z.string().optional(),
  command: z.string().min(1).optional(),
  args: z.array(z.string()).optional(),
  resumeArgs: z.array(z.string()).optional(),
  setup: z.string().optional(),
});

const ConfigFileSchema = z.object({
  repoPath: z.string().optional(),
  repoUrl: z.string().optional(),
  defaultAgent: z.string().optional(),
  watchInterval: z.number().positive().optional(),
  sessionCaptureMs: z.number().int().nonnegative().optional(),
  agents: z.record(z.string(), AgentEntrySchema).optional(),
}).passthrough();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export async function loadConfig(workspaceRoot: string): Promise<Config> {
  const cfgPath = configPath(workspaceRoot);
  let raw: string;
  try {
    raw = await fs.readFile(cfgPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_CONFIG;
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw) ?? {};
  } catch (err) {
    throw new ConfigError(`Failed to parse ${cfgPath}: ${err instanceof Error ? err.message : err}`);
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${cfgPath}: ${issues}`);
  }
  return mergeConfig(DEFAULT_CONFIG, result.data);
}

function mergeConfig(defaults: Config, file: ConfigFile): Config {
  const agents: Record<string, AgentConfig> = { ...defaults.agents };
  for (const [key, entry] of Object.entries(file.agents ?? {})) {
    const base = BUILTIN_AGENTS[key];
    const command = entry.command ?? base?.command;
    if (!command) {
      throw new ConfigError(`Agent "${key}" has no command`);
    }
    const agent: AgentConfig = {
      name: entry.name ?? base?.name ?? key,
      command,
      args: entry.args ?? base?.args ?? [],
    };
    const resumeArgs = entry.resumeArgs ?? base?.resumeArgs;
    if (resumeArgs) agent.resumeArgs = resumeArgs;
    const setup = entry.setup ?? base?.setup;
    if (setup) agent.setup = setup;
    agents[key] = agent;
  }

  return {
    ...defaults,
    ...(file.repoPath !== undefined ? { repoPath: file.repoPath } : {}),
    ...(file.repoUrl !== undefined ? { repoUrl: file.repoUrl } : {}),
    ...(file.defaultAgent !== undefined ? { defaultAgent: file.defaultAgent } : {}),
    watchInterval: file.watchInterval ?? defaults.watchInterval,
    sessionCaptureMs: file.sessionCaptureMs ?? defaults.sessionCaptureMs,
    agents,
  };
}

export async function saveConfig(
  workspaceRoot: string,
  values: { repoPath: string; repoUrl?: string },
): Promise<void> {
  const content = YAML.stringify({
    ...values,
    defaultAgent: BUILTIN_AGENT,
    watchInterval: DEFAULT_CONFIG.watchInterval,
  }, { indent: 2 });
  await fs.writeFile(configPath(workspaceRoot), content, 'utf-8');
}

/**
 * Pick the agent to launch.
 *
 * An explicitly requested name must exist in the config or the built-ins.
 * Without one, `preferred` (the agent a plurb last ran) and then the
 * configured `defaultAgent` are used when they resolve, and the built-in
 * headless Claude Code agent otherwise.
 */
export function resolveAgentConfig(config: Config, name?: string, preferred?: string): AgentConfig {
  const lookup = (key: string): AgentConfig | undefined => config.agents[key] ?? BUILTIN_AGENTS[key];

  if (name) {
    const agent = lookup(name);
    if (!agent) {
      const available = [...new Set([...Object.keys(config.agents), ...Object.keys(BUILTIN_AGENTS)])];
      throw new AgentNotFoundError(name, available);
    }
    return agent;
  }

  for (const candidate of [preferred, config.defaultAgent]) {
    const agent = candidate ? lookup(candidate) : undefined;
    if (agent) return agent;
  }
  return BUILTIN_AGENTS[BUILTIN_AGENT];
}

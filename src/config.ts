// src/config.ts

import { z } from 'zod';
import { ConfigError } from './errors';
import type { LogLevelName } from './utils/logger';

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    // Ollama serves an OpenAI-compatible API under /v1
    LLM_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    LLM_API_KEY: z.string().min(1).default('ollama'),
    LLM_MODEL: z.string().min(1).default('llama3.2'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info')
});

export interface LlmConfig {
    baseURL: string;
    apiKey: string;
    model: string;
    temperature: number;
    timeoutMs: number;
}

export interface AppConfig {
    port: number;
    logLevel: LogLevelName;
    llm: LlmConfig;
}

/**
 * Load configuration from environment variables
 *
 * @throws ConfigError naming every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration - ${problems}`);
    }

    const vars = parsed.data;
    return {
        port: vars.PORT,
        logLevel: vars.LOG_LEVEL,
        llm: {
            baseURL: vars.LLM_BASE_URL,
            apiKey: vars.LLM_API_KEY,
            model: vars.LLM_MODEL,
            temperature: vars.LLM_TEMPERATURE,
            timeoutMs: vars.LLM_TIMEOUT_MS
        }
    };
}

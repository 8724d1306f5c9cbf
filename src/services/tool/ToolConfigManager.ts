// src/services/tool/ToolConfigManager.ts

import fs from 'fs';
import path from 'path';
import Ajv, { ValidateFunction } from 'ajv';
import { z } from 'zod';
import { createLogger } from '../../utils/logger';
import { ToolArguments, ToolDefinition } from './tool.types';

const logger = createLogger('ToolConfigManager');

const toolConfigSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  category: z.string().optional(),
  display_name: z.string().optional(),
  parameters: z.record(z.unknown()).default({ type: 'object', properties: {} }),
});

const toolConfigFileSchema = z.object({
  tools: z.array(toolConfigSchema),
});

type ToolConfig = z.infer<typeof toolConfigSchema> & { category: string };

export class ToolConfigValidationError extends Error {
  constructor(public readonly toolName: string, public readonly issues: string[]) {
    super(`Invalid arguments for '${toolName}': ${issues.join(', ')}`);
    this.name = 'ToolConfigValidationError';
  }
}

/**
 * Loads tool definitions from the JSON tool configuration and validates tool-call
 * arguments against each tool's parameter schema.
 */
export class ToolConfigManager {
  private toolConfigs: Record<string, ToolConfig[]> = {};
  private validators = new Map<string, ValidateFunction>();
  private ajv: InstanceType<typeof Ajv>;

  constructor(source?: string | ToolDefinition[]) {
    this.ajv = new Ajv({ allErrors: true });
    if (Array.isArray(source)) {
      this.register(source.map((tool) => ({ ...tool, category: 'General' })));
    } else {
      this.loadToolConfigs(source);
    }
  }

  private loadToolConfigs(configPath?: string): void {
    const finalPath = configPath || path.join(process.cwd(), 'src', 'config', 'toolConfig.json');

    let parsedConfig: unknown;
    try {
      parsedConfig = JSON.parse(fs.readFileSync(finalPath, 'utf-8'));
    } catch (error) {
      logger.error('ToolConfigManager: Failed to load tool configuration', {
        path: finalPath,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }

    const result = toolConfigFileSchema.safeParse(parsedConfig);
    if (!result.success) {
      throw new Error(`Invalid tool configuration at ${finalPath}: ${result.error.message}`);
    }

    this.register(result.data.tools.map((tool) => ({ ...tool, category: tool.category || 'General' })));

    logger.info('ToolConfigManager: Loaded tool configuration', {
      path: finalPath,
      toolsByCategory: Object.entries(this.toolConfigs).map(([category, tools]) => ({
        category,
        names: tools.map((t) => t.name),
      })),
    });
  }

  private register(tools: ToolConfig[]): void {
    for (const tool of tools) {
      if (this.toolExists(tool.name)) {
        throw new Error(`Duplicate tool definition: ${tool.name}`);
      }
      // Compiling up front rejects a broken schema at startup instead of on first call.
      this.validators.set(tool.name, this.ajv.compile(tool.parameters));
      (this.toolConfigs[tool.category] ??= []).push(tool);
    }
  }

  /**
   * Definitions in the shape the agent runtime registers function tools with.
   */
  public getToolDefinitions(): ToolDefinition[] {
    return this.getAllTools().map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }

  public toolExists(toolName: string): boolean {
    return this.validators.has(toolName);
  }

  /**
   * Throws ToolConfigValidationError when args do not match the tool's parameter schema.
   */
  public validateToolArgs(toolName: string, args: ToolArguments): void {
    const validate = this.validators.get(toolName);
    if (!validate) {
      throw new Error(`No schema found for tool: ${toolName}`);
    }

    if (!validate(args)) {
      const issues = validate.errors?.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`) ?? ['validation failed'];
      logger.warn('Validation failed', { toolName, issues });
      throw new ToolConfigValidationError(toolName, issues);
    }
  }

  private getAllTools(): ToolConfig[] {
    return Object.values(this.toolConfigs).flat();
  }
}

#!/usr/bin/env node
/**
 * Semester Scheduler MCP Server
 * Main entry point for the Model Context Protocol server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getConfig } from './utils/config.js';
import { formatErrorForMCP, isFatalError, wrapError } from './utils/error.js';
import { createLogger } from './utils/logger.js';
import { createAppContext, disposeAppContext } from './app.js';
import { toolDefinitions, createToolHandlers, callTool } from './tools/index.js';
import { resourceDefinitions, createResourceHandlers } from './resources/index.js';
import { promptDefinitions, createPromptHandlers } from './prompts/index.js';

const logger = createLogger('server');

/**
 * Create and configure the MCP server
 */
async function createServer(): Promise<Server> {
  const config = getConfig();
  const context = await createAppContext(config, logger);

  const toolHandlers = createToolHandlers(context);
  const resourceHandlers = createResourceHandlers(context.store, config);
  const promptHandlers = createPromptHandlers();

  // Create MCP server
  const server = new Server(
    {
      name: config.server.name,
      version: config.server.version,
    },
    {
      capabilities: {
        tools: {},
        resources: {},
        prompts: {},
      },
    }
  );

  /**
   * A write aimed at an uncontrolled calendar means the configuration is
   * wrong; stop instead of serving further requests.
   */
  const shutdownOnFatal = (error: unknown): void => {
    logger.error('Invariant violation, shutting down:', error);
    server
      .close()
      .catch(closeError => logger.error('Error while closing server:', closeError))
      .finally(() => process.exit(1));
  };

  // Register tool list handler
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: toolDefinitions.map(tool => ({
        name: tool.name,
        description: tool.description,
        inputSchema: tool.inputSchema,
      })),
    };
  });

  // Register tool call handler
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      return await callTool(toolHandlers, name, args, logger);
    } catch (error) {
      if (isFatalError(error)) {
        shutdownOnFatal(error);
      }
      return {
        content: [{ type: 'text', text: formatErrorForMCP(wrapError(error)) }],
        isError: true,
      };
    }
  });

  // Register resource list handler
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: resourceDefinitions.map(resource => ({
        uri: resource.uri,
        name: resource.name,
        description: resource.description,
        mimeType: resource.mimeType,
      })),
    };
  });

  // Register resource read handler
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;

    const handler = resourceHandlers[uri];
    if (handler) {
      return handler();
    }

    return {
      contents: [{
        uri,
        mimeType: 'text/plain',
        text: `Unknown resource: ${uri}`,
      }],
    };
  });

  // Register prompt list handler
  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: promptDefinitions.map(prompt => ({
        name: prompt.name,
        description: prompt.description,
        arguments: prompt.arguments,
      })),
    };
  });

  // Register prompt get handler
  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    const handler = promptHandlers[name];
    if (!handler) {
      return {
        description: 'Unknown prompt',
        messages: [{
          role: 'user',
          content: {
            type: 'text',
            text: `Unknown prompt: ${name}. Available prompts: ${Object.keys(promptHandlers).join(', ')}`,
          },
        }],
      };
    }

    return handler(args ?? {});
  });

  return server;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info('Starting semester scheduler server...');

  const server = await createServer();
  const transport = new StdioServerTransport();

  await server.connect(transport);
  logger.info('Server running on stdio transport');

  // Handle graceful shutdown
  const shutdown = () => {
    logger.info('Shutting down...');
    server
      .close()
      .then(() => disposeAppContext())
      .catch(error => logger.error('Error while closing server:', error))
      .finally(() => process.exit(0));
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Run the server
main().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});

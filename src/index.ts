#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { DEFAULT_OTAD_EXECUTABLE, OtadClient } from "./backend/ortery/otadCommand.js";
import { loadConfig } from "./config.js";
import { Logger } from "./logger.js";
import { loadPackageMeta } from "./meta.js";
import { registerTools } from "./tools/register.js";
import { KeyedLock } from "./utils.js";

/**
 * MCP server entrypoint.
 *
 * Loads `config.json`, builds the vendor client (local or over SSH) and
 * serves the turntable tools on stdio.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const pkg = loadPackageMeta();
  const logger = new Logger(config.logLevel);

  const otadCommand = config.otadCommand ?? DEFAULT_OTAD_EXECUTABLE;
  const remoteHost = config.ssh ? `${config.ssh.user}@${config.ssh.host}` : null;

  const client = new OtadClient({
    executable: otadCommand,
    target: config.ssh,
    logger,
    propertyReadMaxAttempts: config.propertyRead?.maxAttempts,
  });

  const server = new McpServer({ name: "turntable", version: pkg.version });

  // Tools must be registered before connecting to a transport, since
  // registration mutates server capabilities and request handlers.
  registerTools(
    server,
    { client, lock: new KeyedLock(), logger },
    {
      serverName: "turntable",
      serverVersion: pkg.version,
      transport: config.transport,
      logLevel: config.logLevel,
      otadCommand,
      remoteHost,
    }
  );

  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.printBanner({
    transport: config.transport,
    otadCommand,
    remote: remoteHost ?? "local",
  });
}

main().catch((err) => {
  const msg = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  process.stderr.write(`[turntable-mcp] fatal ${msg}\n`);
  process.exitCode = 1;
});

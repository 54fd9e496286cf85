#!/usr/bin/env node
/**
 * outlook-export
 *
 * Retrieves a user's inbox messages, sent messages and calendar events
 * from Microsoft Graph and exports them to one JSON document. Also runs as
 * an MCP server so agents can call the same operations as tools.
 *
 * @see https://learn.microsoft.com/en-us/graph/api/resources/mail-api-overview
 */

import { createRequire } from "node:module";
import dotenv from "dotenv";
import { buildProgram } from "./cli.js";
import { APP_NAME } from "./constants.js";

dotenv.config();

const require = createRequire(import.meta.url);
const packageJson = require("../package.json") as { version: string };

buildProgram({ version: packageJson.version })
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(`[${APP_NAME}] Fatal error:`, error);
    process.exit(1);
  });

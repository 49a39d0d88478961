import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { cfgFromEnv } from "./config.js";
import { createServer } from "./server.js";

const server = createServer(cfgFromEnv());
const transport = new StdioServerTransport();
await server.connect(transport);

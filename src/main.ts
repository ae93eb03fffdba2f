#!/usr/bin/env node

import { DdgSearchServer } from "./server/DdgSearchServer.js";

// --stdio serves a single client over stdin/stdout; the default is HTTP + SSE
const mode = process.argv.includes("--stdio") ? "stdio" : "http";

const server = new DdgSearchServer();
await server.run(mode);

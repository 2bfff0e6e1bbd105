import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Entry point of the compiled MCP server, spawned by agents as a subprocess
export const MCP_SERVER_PATH = join(__dirname, 'mcp', 'index.js');

import { createServer } from 'http';
import { DATA_DIR, PORT } from './config.js';
import { PresetDB } from './data/PresetDB.js';
import { createApp } from './api/app.js';

// ─── Express app ───────────────────────────────────────────────────────────
const presets = new PresetDB(DATA_DIR);
const app = createApp({ presets });

// ─── Start server ──────────────────────────────────────────────────────────
const server = createServer(app);

server.listen(PORT, () => {
  console.log(`[Server] Loadsheet server running on port ${PORT}`);
  console.log(`[Server] Aircraft data: ${DATA_DIR}`);
  console.log(`[Server] REST: http://localhost:${PORT}/api/loadsheet`);
});

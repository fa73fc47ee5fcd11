import { createApp } from './app.js';
import { openDatabase } from './config/database.js';
import { config } from './config/dotenv.js';
import { createShutdown } from './utils/shutdown.js';

const db = openDatabase(config.databasePath);
const app = createApp(db, config.allowedOrigins);

// Start Server
const server = app.listen(config.port, () => {
  console.log(`Server is running on http://localhost:${config.port}`);
});

const shutdown = createShutdown(server, db);
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

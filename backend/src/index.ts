import { Elysia } from 'elysia';
import { node } from '@elysiajs/node';
import { cors } from '@elysiajs/cors';
import { config, rulesFromConfig } from './utils/config.js';
import { log } from './utils/logger.js';
import { RoomManager } from './room/manager.js';
import { TimeoutScheduler } from './room/timer.js';
import { ConnectionRegistry } from './ws/connections.js';
import { createWsHandler } from './ws/handler.js';
import { gameRoutes } from './http/games.js';

const connections = new ConnectionRegistry();
const manager = new RoomManager({
  scheduler: new TimeoutScheduler(),
  broadcaster: connections,
  turnTimeoutMs: config.TURN_TIMEOUT_MS,
  rules: rulesFromConfig(config),
  idleMs: config.ROOM_IDLE_MS,
  ttlMs: config.ROOM_TTL_MS,
});

// Periodically drop abandoned and expired rooms
setInterval(() => {
  const removed = manager.cleanupIdleRooms();
  if (removed.length > 0) {
    log.room.info(`Cleaned up ${removed.length} room(s)`, { codes: removed });
  }
}, config.ROOM_SWEEP_MS);

const app = new Elysia({ adapter: node() })
  // CORS for API endpoints
  .use(cors({
    origin: '*',
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }))
  // Health check endpoint
  .get('/health', () => ({ status: 'ok', rooms: manager.roomCount(), timestamp: new Date().toISOString() }))
  .use(gameRoutes(manager))
  .use(createWsHandler(manager, connections))
  .listen(config.PORT, () => {
    log.http.info(`304 server running at http://localhost:${config.PORT}`);
    log.ws.info(`WebSocket endpoint: ws://localhost:${config.PORT}/ws`);
  });

export type App = typeof app;

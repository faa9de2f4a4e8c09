import http from "http";
import { Server as IOServer } from "socket.io";

import config from "./config.js";
import { createApp } from "./app.js";
import { PlannerDatabase } from "./data/database.js";
import { createPlanner } from "./planner.js";

// ---- Instantiate shared services ----
const db = new PlannerDatabase(config.dataFile);
const planner = createPlanner(db, {
  deletePolicy: config.deletePolicy,
  defaultCurrency: config.defaultCurrency,
});

// ---- Express app + HTTP + Socket.IO ----
const app = createApp(planner, config);
const server = http.createServer(app);

const io = new IOServer(server, {
  cors: {
    origin: config.allowedOrigins,
    methods: ["GET", "POST"],
  },
});

io.on("connection", (socket) => {
  console.log(`[itinera] Client connected (${socket.id})`);
});

// Every committed write tells connected clients to refetch what they show.
const stopChangeFeed = db.onChange((notice) => {
  io.emit("planner:changed", notice);
});

// Hot-reload when another process (e.g. `itinera import`) rewrites the data file.
const stopWatching = config.watchDataFile
  ? db.watchFile(() => {
      io.emit("planner:reloaded", { at: new Date().toISOString() });
    })
  : () => {};

// ---- Graceful shutdown ----
let isShuttingDown = false;

function gracefulShutdown(signal: string): void {
  if (isShuttingDown) return;
  isShuttingDown = true;

  console.log(`[itinera] ${signal} received — shutting down`);
  stopWatching();
  stopChangeFeed();
  // Data is written on every commit, so there is nothing to flush here.
  io.close(() => {
    console.log("[itinera] Closed");
    process.exit(0);
  });
}

// ---- Start listening ----
server.listen(config.port, config.host, () => {
  console.log(`[itinera] Server running at http://${config.host}:${config.port}`);
  console.log(`[itinera] Data file: ${db.location} (delete policy: ${config.deletePolicy})`);
});

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

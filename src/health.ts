import http from "node:http";
import type { DeviceStatus } from "./presence/presence.tracker.js";
import type { ScanState } from "./scan/scan.loop.js";

export type StatusReport = {
  scan: ScanState;
  lockedByUs: boolean;
  devices: DeviceStatus[];
};

export function createHealthServer(
  port: number,
  getStatus: () => StatusReport
): http.Server {
  const server = http.createServer((req, res) => {
    if (req.method === "GET" && req.url === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "ok" }));
    } else if (req.method === "GET" && req.url === "/status") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify(getStatus()));
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  server.on("error", (err) => {
    console.error(`Health server error: ${err.message}`);
  });
  server.listen(port);
  return server;
}

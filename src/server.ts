import http from "http";
import type { PollerStatus } from "./application/process-work-items/poller";

export const createServer = (status: () => PollerStatus) => {
  return http.createServer((req, res) => {
    const path = (req.url ?? "/").split("?")[0];
    if (req.method !== "GET" || (path !== "/" && path !== "/health")) {
      res.writeHead(404, { "content-type": "application/json" });
      res.end(JSON.stringify({ ok: false, message: "not found" }));
      return;
    }

    const current = status();
    res.writeHead(current.running ? 200 : 503, { "content-type": "application/json" });
    res.end(JSON.stringify({ ok: current.running, ...current }));
  });
};

export const listen = (server: http.Server, port: number): Promise<void> =>
  new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => {
      server.off("error", reject);
      resolve();
    });
  });

export const close = (server: http.Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });

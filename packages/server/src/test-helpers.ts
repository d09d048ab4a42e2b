import { once } from "node:events";
import type { Server } from "node:http";
import type { Express } from "express";

export type TestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

/** Starts the app on an ephemeral local port. */
export async function serve(app: Express): Promise<TestServer> {
  const server: Server = app.listen(0, "127.0.0.1");
  await once(server, "listening");
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("server has no TCP address");

  return {
    baseUrl: `http://127.0.0.1:${addr.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((e) => (e ? reject(e) : resolve()));
        server.closeAllConnections();
      }),
  };
}

export function postJson(baseUrl: string, path: string, body: string) {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body,
  });
}

import { Express } from "express";

export interface TestServer {
  baseUrl: string;
  close: () => Promise<void>;
}

/** Listens on an ephemeral localhost port; `close` also drops keep-alive sockets. */
export const startTestServer = (app: Express): Promise<TestServer> =>
  new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1");
    server.once("error", reject);
    server.once("listening", () => {
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error("Test server has no TCP address"));
        return;
      }
      resolve({
        baseUrl: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

export type RecordedRequest = {
  method: string;
  path: string;
  query: URLSearchParams;
  headers: IncomingMessage["headers"];
  body: string;
};

export type RouteHandler = (
  request: RecordedRequest,
) => { status?: number; body?: unknown } | undefined;

export type TestInventoryServer = {
  baseUrl: string;
  requests: RecordedRequest[];
  /** Routes are keyed "METHOD /path" and looked up per request. */
  routes: Map<string, RouteHandler>;
  close: () => Promise<void>;
};

const readBody = async (request: IncomingMessage) => {
  const chunks: Buffer[] = [];
  for await (const chunk of request) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf8");
};

const reply = (response: ServerResponse, status: number, body: unknown) => {
  response.statusCode = status;
  response.setHeader("content-type", "application/json");
  response.end(body === undefined ? "" : JSON.stringify(body));
};

/**
 * In-process HTTP server standing in for the inventory API.
 */
export async function startTestInventoryServer(): Promise<TestInventoryServer> {
  const requests: RecordedRequest[] = [];
  const routes = new Map<string, RouteHandler>();

  const server: Server = createServer((request, response) => {
    readBody(request).then(
      (body) => {
        const url = new URL(request.url ?? "/", "http://localhost");
        const recorded: RecordedRequest = {
          method: request.method ?? "GET",
          path: url.pathname,
          query: url.searchParams,
          headers: request.headers,
          body,
        };
        requests.push(recorded);

        const handler = routes.get(`${recorded.method} ${recorded.path}`);
        const result = handler?.(recorded);
        if (!result) {
          reply(response, 404, { errors: [{ description: "Not found" }] });
          return;
        }
        reply(response, result.status ?? 200, result.body);
      },
      (error: unknown) => {
        reply(response, 500, { message: String(error) });
      },
    );
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Server address unavailable");
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    requests,
    routes,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

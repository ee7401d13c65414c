import "dotenv/config";
import http from "http";

const PORT = Number(process.env.PORT || 8002);
const HOST = process.env.TOOLHOST_HOST || "127.0.0.1";
const BASE = process.env.TOOLHOST_BASE_PATH || "/worker";
const SECRET = process.env.TOOLHOST_WORKER_SECRET || "";

function request(method: "GET" | "POST", path: string, body?: unknown): Promise<{ status: number; json: unknown }> {
  return new Promise((resolve, reject) => {
    const data = body === undefined ? undefined : JSON.stringify(body);
    const headers: http.OutgoingHttpHeaders = { Authorization: `Bearer ${SECRET}` };
    if (data) {
      headers["Content-Type"] = "application/json";
      headers["Content-Length"] = Buffer.byteLength(data);
    }
    const req = http.request({ hostname: HOST, port: PORT, path: `${BASE}${path}`, method, headers }, res => {
      let text = "";
      res.setEncoding("utf8");
      res.on("data", chunk => (text += chunk));
      res.on("end", () => {
        try {
          resolve({ status: res.statusCode || 0, json: text ? JSON.parse(text) : null });
        } catch (e) {
          reject(e);
        }
      });
    });
    req.on("error", reject);
    if (data) req.write(data);
    req.end();
  });
}

function parseInputs(pairs: string[]): Record<string, string> {
  const inputs: Record<string, string> = {};
  for (const pair of pairs) {
    const at = pair.indexOf("=");
    if (at > 0) inputs[pair.slice(0, at)] = pair.slice(at + 1);
  }
  return inputs;
}

// usage: invoke.ts [Toolkit.Tool key=value ...]
async function main() {
  const [toolName = "Math.Add", ...pairs] = process.argv.slice(2);
  const inputs = pairs.length ? parseInputs(pairs) : { a: "2", b: "3" };

  const health = await request("GET", "/health");
  console.log("health:", JSON.stringify(health.json));

  const catalog = await request("GET", "/tools");
  console.log(`catalog (${catalog.status}):\n${JSON.stringify(catalog.json, null, 2)}`);

  const invoked = await request("POST", "/tools/invoke", { tool: { name: toolName }, inputs });
  console.log(`invoke ${toolName} (${invoked.status}):\n${JSON.stringify(invoked.json, null, 2)}`);
}

main().catch(e => {
  console.error(e);
  process.exitCode = 1;
});

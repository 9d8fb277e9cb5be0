import "dotenv/config";
import http from "http";

// Usage: npm run call -- <tool> '<json arguments>'
//        npm run call -- --list
const PORT = Number(process.env.PORT || 8086);
const HOST = process.env.CALL_HOST || "localhost";

function request(method: "GET" | "POST", path: string, body?: unknown): Promise<string> {
  return new Promise((resolve, reject) => {
    const data = body === undefined ? undefined : JSON.stringify(body);
    const headers = data === undefined ? {} : { "Content-Type": "application/json", "Content-Length": Buffer.byteLength(data) };
    const req = http.request({ hostname: HOST, port: PORT, path, method, headers }, (res) => {
      let text = "";
      res.setEncoding("utf8");
      res.on("data", (chunk) => (text += chunk));
      res.on("end", () => resolve(text));
    });
    req.on("error", reject);
    if (data !== undefined) req.write(data);
    req.end();
  });
}

async function main() {
  const [name, rawArgs] = process.argv.slice(2);
  if (!name || name === "--list") {
    const tools: unknown = JSON.parse(await request("GET", "/tools"));
    console.log(JSON.stringify(tools, null, 2));
    return;
  }
  const args: unknown = rawArgs ? JSON.parse(rawArgs) : {};
  const reply: unknown = JSON.parse(await request("POST", "/call_tool", { name, arguments: args }));
  if (typeof reply === "object" && reply !== null && "content" in reply && Array.isArray(reply.content)) {
    for (const block of reply.content) {
      if (typeof block === "object" && block !== null && "text" in block) console.log(String(block.text));
    }
  } else {
    console.log(JSON.stringify(reply, null, 2));
  }
}

main().catch((e) => {
  console.error(e);
  process.exitCode = 1;
});

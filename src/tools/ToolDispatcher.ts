import crypto from "crypto";
import type { Logger } from "pino";
import type { TextContent, ToolError, ToolInput } from "./ToolTypes";
import type { ToolRegistry } from "./ToolRegistry";

export const ERROR_MARKER = "❌";

/** A dispatched call: the typed outcome plus its rendering when it succeeded. */
export type DispatchResult = { ok: true; data: unknown; text: string } | { ok: false; error: ToolError };

export function formatError(error: ToolError): string {
  return `${ERROR_MARKER} ${error.message}`;
}

export function formatResult(result: DispatchResult): string {
  return result.ok ? result.text : formatError(result.error);
}

export class ToolDispatcher {
  constructor(private registry: ToolRegistry, private logger: Logger) {}

  listTools() {
    return this.registry.list();
  }

  async call(name: string, input: ToolInput = {}): Promise<DispatchResult> {
    const requestId = crypto.randomUUID();
    const log = this.logger.child({ requestId, tool: name });
    const tool = this.registry.has(name) ? this.registry.get(name) : undefined;
    if (!tool) {
      log.warn("unknown tool requested");
      return { ok: false, error: { kind: "unknown_tool", message: `Unknown tool: ${name}` } };
    }
    const started = Date.now();
    let result: DispatchResult;
    try {
      const out = await tool.execute(input, { requestId, logger: log });
      result = out.ok ? { ok: true, data: out.data, text: tool.render(out.data) } : out;
    } catch (e: unknown) {
      log.error({ err: e }, "tool threw");
      const message = e instanceof Error ? e.message : String(e);
      result = { ok: false, error: { kind: "internal", message: `Error running ${name}: ${message}` } };
    }
    const latencyMs = Date.now() - started;
    log.info({ ok: result.ok, kind: result.ok ? undefined : result.error.kind, latencyMs }, "tool call");
    return result;
  }

  /** Boundary form: exactly one text block carrying either the result or the error. */
  async callText(name: string, input: ToolInput = {}): Promise<TextContent[]> {
    return [{ type: "text", text: formatResult(await this.call(name, input)) }];
  }
}

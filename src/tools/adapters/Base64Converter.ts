import { TextDecoder } from "util";
import type { ToolAdapter, ToolInput, ToolOutput, ToolSpec } from "../ToolTypes";
import { failure, success } from "../ToolTypes";
import { readString } from "../args";
import { preview } from "../../utils/text";

const spec: ToolSpec<"base64_converter"> = {
  name: "base64_converter",
  description: "Encode text to Base64 or decode Base64 to text",
  fields: [
    { name: "text", type: "string", description: "Text to encode or Base64 string to decode", required: true },
    { name: "operation", type: "string", description: "Operation: 'encode' or 'decode'", required: true },
  ],
};

const BASE64_RE = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export type Base64Operation = "encode" | "decode";

export class Base64Error extends Error {
  constructor(message: string) {
    super(message);
    this.name = "Base64Error";
  }
}

export function encodeBase64(text: string): string {
  return Buffer.from(text, "utf-8").toString("base64");
}

/** Strict decode: canonical padded alphabet and valid UTF-8, whitespace ignored. */
export function decodeBase64(encoded: string): string {
  const compact = encoded.replace(/\s+/g, "");
  if (!BASE64_RE.test(compact)) throw new Base64Error("Invalid Base64 input (bad alphabet or padding)");
  const bytes = Buffer.from(compact, "base64");
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
  } catch {
    throw new Base64Error("Decoded bytes are not valid UTF-8");
  }
}

export interface Base64Result {
  operation: Base64Operation;
  input: string;
  output: string;
}

export class Base64ConverterAdapter implements ToolAdapter<"base64_converter", Base64Result> {
  spec = spec;

  async execute(input: ToolInput): Promise<ToolOutput<Base64Result>> {
    const text = readString(input, "text");
    if (!text.ok) return failure("invalid_argument", text.message);
    const operation = readString(input, "operation");
    if (!operation.ok) return failure("invalid_argument", operation.message);
    const op = operation.value.toLowerCase();
    if (op === "encode") return success({ operation: op, input: text.value, output: encodeBase64(text.value) });
    if (op === "decode") {
      try {
        return success({ operation: op, input: text.value, output: decodeBase64(text.value) });
      } catch (e: unknown) {
        if (e instanceof Base64Error) return failure("decode_failure", `Error with Base64 operation: ${e.message}`);
        throw e;
      }
    }
    return failure("unknown_selector", "Invalid operation. Use 'encode' or 'decode'");
  }

  render(r: Base64Result): string {
    const lines = r.operation === "encode"
      ? ["✅ **BASE64 ENCODED**", "", `**Original:** ${preview(r.input)}`, `**Encoded:** ${r.output}`, "", "📋 **Copy the encoded text above!**"]
      : ["✅ **BASE64 DECODED**", "", `**Encoded:** ${preview(r.input)}`, `**Decoded:** ${r.output}`, "", "📋 **Copy the decoded text above!**"];
    return lines.join("\n");
  }
}

import crypto from "crypto";
import type { ToolAdapter, ToolContext, ToolInput, ToolOutput, ToolSpec } from "../ToolTypes";
import { failure, success } from "../ToolTypes";
import { readString } from "../args";

const spec: ToolSpec<"validate"> = {
  name: "validate",
  description: "Validate bearer token and return phone number for authentication",
  fields: [
    { name: "token", type: "string", description: "Bearer token to validate", required: true },
  ],
};

export interface Credentials {
  authToken: string;
  identifier: string;
}

/** Exact, case-sensitive comparison in constant time. */
export function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given, "utf-8");
  const b = Buffer.from(expected, "utf-8");
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export class ValidateAdapter implements ToolAdapter<"validate", { identifier: string }> {
  spec = spec;

  constructor(private credentials: Credentials) {}

  async execute(input: ToolInput, ctx: ToolContext): Promise<ToolOutput<{ identifier: string }>> {
    const token = readString(input, "token");
    if (!token.ok) return failure("invalid_argument", token.message);
    if (tokensMatch(token.value, this.credentials.authToken)) {
      ctx.logger.info({ requestId: ctx.requestId }, "token validated");
      return success({ identifier: this.credentials.identifier });
    }
    ctx.logger.warn({ requestId: ctx.requestId }, "invalid token provided");
    return failure("unauthorized", "Invalid token");
  }

  render(data: { identifier: string }): string {
    return data.identifier;
  }
}

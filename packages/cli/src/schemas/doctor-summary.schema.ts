export const doctorSummarySchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  type: "object",
  additionalProperties: true,
  required: ["ok", "action", "final", "checks"],
  properties: {
    ok: { type: "boolean" },
    action: { const: "doctor" },
    final: { const: true },
    checks: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["name", "status"],
        properties: {
          name: { type: "string" },
          status: { enum: ["pass", "fail", "unknown"] },
          detail: { type: "string" }
        }
      }
    }
  }
} as const

/**
 * JSON Schema (draft-07) describing the structure every persisted context document must have.
 * Soft rules (semver, timestamps, description length, rule compilation) live in validation.ts.
 */

const freeObject = { type: "object" } as const;

export const contextDocumentSchema = {
  $id: "context-document",
  type: "object",
  required: ["tool_category", "description"],
  properties: {
    tool_category: { type: "string", pattern: "^[A-Za-z0-9_-]{1,50}$" },
    description: { type: "string" },
    auto_convert: { type: "boolean" },
    syntax_rules: freeObject,
    preferences: freeObject,
    auto_corrections: freeObject,
    auto_store_triggers: freeObject,
    auto_retrieve_triggers: freeObject,
    session_initialization: {
      type: "object",
      properties: {
        enabled: { type: "boolean" },
        actions: {
          type: "object",
          properties: {
            on_startup: {
              type: "array",
              items: {
                type: "object",
                required: ["action"],
                properties: {
                  action: { type: "string" },
                  parameters: freeObject,
                  description: { type: "string" },
                },
              },
            },
          },
        },
      },
    },
    metadata: {
      type: "object",
      properties: {
        applies_to_tools: { type: "array", items: { type: "string" } },
        optimization_count: { type: "integer", minimum: 0 },
      },
    },
  },
} as const;

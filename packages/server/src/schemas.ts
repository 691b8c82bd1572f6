/**
 * Zod schemas for tool inputs
 *
 * Names and categories are only checked for shape here; the store applies the
 * naming rules and reports them as structured results.
 */

import { z } from "zod";
import { PATTERN_SECTIONS } from "@ctxrules/sdk";

const ToolNameSchema = z.string().min(1, "tool_name must be a non-empty string");

const ContextNameSchema = z.string().min(1, "context_name must be a non-empty string");

const ObjectSchema = z.record(z.string(), z.unknown());

export const ToolNameInputSchema = z.object({
  tool_name: ToolNameSchema,
});

export const EmptyInputSchema = z.object({}).optional();

export const ApplyCorrectionsInputSchema = z.object({
  tool_name: ToolNameSchema,
  text: z.string(),
});

export const CreateContextInputSchema = z.object({
  context_name: ContextNameSchema,
  tool_category: z.string().min(1, "tool_category must be a non-empty string"),
  rules: ObjectSchema.optional(),
});

export const UpdateContextInputSchema = z.object({
  context_name: ContextNameSchema,
  updates: ObjectSchema,
});

export const AddPatternInputSchema = z.object({
  context_name: ContextNameSchema,
  section: z.string().refine((value) => PATTERN_SECTIONS.some((section) => section === value), {
    message: `section must be one of ${PATTERN_SECTIONS.join(", ")}`,
  }),
  pattern_name: z.string().min(1, "pattern_name must be a non-empty string"),
  pattern_config: ObjectSchema,
});

export const OptimizeContextInputSchema = z.object({
  context_name: ContextNameSchema,
  updates: ObjectSchema,
  reason: z.string().optional(),
});

export const ValidateContextInputSchema = z.object({
  document: z.unknown().refine((value) => value !== undefined, { message: "document is required" }),
});

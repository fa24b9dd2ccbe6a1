/**
 * Zod runtime schema for operation signatures.
 *
 * Mirrors the BoundOperation shape in operation.ts minus the target callable,
 * and rejects signatures the invoker could not dispatch unambiguously.
 */

import { z } from "zod";

export const ReturnKindSchema = z.enum(["none", "value", "async-none", "async-value"]);

export const ParameterSlotSchema = z.object({
  name: z.string().min(1),
  defaultValue: z.unknown().optional(),
});

function addDuplicateIssues(
  slots: { name: string }[],
  path: "inputs" | "outputs",
  ctx: z.RefinementCtx
): void {
  const seen = new Set<string>();
  slots.forEach((slot, index) => {
    if (seen.has(slot.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate ${path} slot "${slot.name}"`,
        path: [path, index, "name"],
      });
    }
    seen.add(slot.name);
  });
}

export const OperationSignatureSchema = z
  .object({
    name: z.string().min(1),
    inputs: z.array(ParameterSlotSchema),
    outputs: z.array(ParameterSlotSchema),
    returns: ReturnKindSchema,
  })
  .superRefine((sig, ctx) => {
    addDuplicateIssues(sig.inputs, "inputs", ctx);
    addDuplicateIssues(sig.outputs, "outputs", ctx);
  });

export type OperationSignature = z.infer<typeof OperationSignatureSchema>;

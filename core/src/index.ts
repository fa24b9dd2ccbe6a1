// Operation model
export * from "./operation.js";

// Signature Zod schemas (runtime validation)
export {
  OperationSignatureSchema,
  ParameterSlotSchema,
  ReturnKindSchema,
  type OperationSignature,
} from "./operation-schema.js";

// Outcomes
export * from "./outcome.js";

// Errors
export * from "./errors.js";

// Classification
export { classify, toInfrastructureFailure } from "./classify.js";

// Telemetry contract
export * from "./telemetry.js";

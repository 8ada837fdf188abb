// Zod schemas
export {
  LoadValidationOutcomeSchema,
  LoadValidationResultSchema,
  LoadableConfigSchema,
} from "./loadable";

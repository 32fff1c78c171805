// backend/services/shared/src/binding/dsl/index.ts
/**
 * Purpose:
 * - Public export surface for the binding Field DSL.
 */

export { field } from "./field";
export type {
  BindableType,
  FieldDescriptor,
  FieldKind,
  FieldTags,
  FieldsShape,
  ScalarKind,
  SelfValidating,
} from "./types";

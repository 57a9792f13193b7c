import { FieldType, Scalar } from "./types";

/**
 * A field of the underlying object's schema. Resources build their
 * publishable fields from these.
 */
export interface ModelField {
  type: FieldType;
  /**
   * The field may be left out of a write payload. Default field construction
   * ignores this marker; see `AdditionalModelResource.postProcessFields`.
   */
  blank?: boolean;
  null?: boolean;
  default?: Scalar | unknown[] | (() => Scalar | unknown[]);
  unique?: boolean;
  /**
   * Name of the model a foreign key points at. Such fields are only
   * published when a resource declares a related field for them.
   */
  references?: string;
  choices?: readonly (readonly [code: string, label: string])[];
  helpText?: string;
}

/**
 * The model names a kind of stored record and describes its schema. The
 * `id` attribute is implicit.
 */
export interface Model {
  name: string;
  fields: Readonly<Record<string, ModelField>>;
}

//////////////////
// HELPER TYPES //
//////////////////

export const fieldEntries = (model: Model) => Object.entries(model.fields);

export const resolveDefault = (value: ModelField["default"]) =>
  typeof value === "function" ? value() : value;

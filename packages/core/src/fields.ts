import type { Api } from "./api";
import type { ModelResource } from "./resource";
import { Bundle } from "./bundle";
import { ApiFieldError, BAD_REQUEST } from "./errors";
import { ModelField, resolveDefault } from "./model";
import { Entity, FieldType, Scalar, Whenever, isPlainObject } from "./types";

/**
 * Where a related field resolves the resources it points at
 */
export interface Namespace {
  readonly api: Api;
  readonly resourceName: string;
}

export type Extractor = (bundle: Bundle) => Whenever<unknown>;

export interface FieldOptions {
  /**
   * Stored attribute to read, or a function computing the raw value. Defaults
   * to the field name.
   */
  attribute?: string | Extractor;
  null?: boolean;
  blank?: boolean;
  readonly?: boolean;
  unique?: boolean;
  default?: ModelField["default"];
  helpText?: string;
}

export interface FieldDescription {
  type: string;
  nullable: boolean;
  blank: boolean;
  readonly: boolean;
  unique: boolean;
  help_text: string;
  default: unknown;
  related_type?: "to_one" | "to_many";
}

export const isEntity = (value: unknown): value is Entity =>
  isPlainObject(value) && typeof value.id === "string";

export abstract class ApiField {
  abstract readonly dehydratedType: "attribute" | "related";
  abstract readonly type: string;

  name = "";
  attribute: string | Extractor | undefined;
  null: boolean;
  blank: boolean;
  readonly: boolean;
  unique: boolean;
  helpText: string;
  protected readonly defaultValue: ModelField["default"];

  constructor(options: FieldOptions = {}) {
    this.attribute = options.attribute;
    this.null = options.null ?? false;
    this.blank = options.blank ?? false;
    this.readonly = options.readonly ?? false;
    this.unique = options.unique ?? false;
    this.helpText = options.helpText ?? "";
    this.defaultValue = options.default;
  }

  /** @internal */
  contribute(name: string) {
    this.name = name;
  }

  /**
   * Attribute writes go to. Null for computed fields.
   */
  get attributeName(): string | null {
    if (this.attribute === undefined) return this.name;
    return typeof this.attribute === "string" ? this.attribute : null;
  }

  get hasDefault() {
    return this.defaultValue !== undefined;
  }

  /**
   * Value to store when a write leaves the field out, or null when the field
   * is required.
   */
  missing(): { value: unknown } | null {
    if (this.defaultValue !== undefined) {
      return { value: resolveDefault(this.defaultValue) };
    }
    if (this.null) return { value: null };
    if (this.blank) return { value: this.blankValue() };
    return null;
  }

  describe(): FieldDescription {
    return {
      type: this.type,
      nullable: this.null,
      blank: this.blank,
      readonly: this.readonly,
      unique: this.unique,
      help_text: this.helpText,
      default:
        this.defaultValue === undefined
          ? "No default provided."
          : typeof this.defaultValue === "function"
          ? "Computed when the object is created."
          : this.defaultValue,
    };
  }

  protected blankValue(): unknown {
    return undefined;
  }

  protected async extract(bundle: Bundle): Promise<unknown> {
    const { attribute } = this;
    if (typeof attribute === "function") return attribute(bundle);
    return bundle.obj[attribute ?? this.name];
  }

  /**
   * What an empty raw value dehydrates to
   */
  protected empty(bundle: Bundle): unknown {
    if (this.null) return null;
    if (this.hasDefault) return resolveDefault(this.defaultValue);
    throw new ApiFieldError(
      `The object '${bundle.obj.id}' has an empty attribute '${this.name}' and doesn't allow a default or null value.`
    );
  }

  abstract dehydrate(bundle: Bundle): Promise<unknown>;

  abstract hydrate(value: unknown): Promise<unknown>;
}

///////////////////////
// ATTRIBUTE FIELDS //
///////////////////////

const TYPE_LABELS = new Map<FieldType, string>([
  [String, "string"],
  [Number, "number"],
  [Boolean, "boolean"],
  [Date, "datetime"],
  [Array, "list"],
]);

export interface AttributeFieldOptions extends FieldOptions {
  choices?: ModelField["choices"];
  /**
   * Checks a converted write value. Returns the message of the 400 answered
   * when the value is refused.
   */
  validate?: (value: Scalar | unknown[]) => string | undefined;
}

export class AttributeField extends ApiField {
  readonly dehydratedType = "attribute";
  readonly choices: ModelField["choices"];
  private readonly validate: AttributeFieldOptions["validate"];

  constructor(readonly valueType: FieldType, options: AttributeFieldOptions = {}) {
    super(options);
    this.choices = options.choices;
    this.validate = options.validate;
  }

  /**
   * Default construction from a schema field. The schema's `blank` marker is
   * not carried over.
   */
  static fromModelField(field: ModelField) {
    return new AttributeField(field.type, {
      null: field.null,
      default: field.default,
      unique: field.unique,
      helpText: field.helpText,
      choices: field.choices,
    });
  }

  get type() {
    return TYPE_LABELS.get(this.valueType) ?? "string";
  }

  async dehydrate(bundle: Bundle): Promise<unknown> {
    const value = await this.extract(bundle);
    if (value === undefined || value === null) return this.empty(bundle);
    return value instanceof Date ? value.toISOString() : value;
  }

  async hydrate(value: unknown): Promise<unknown> {
    if (value === null) {
      if (this.null) return null;
      throw BAD_REQUEST(`The '${this.name}' field doesn't allow a null value.`);
    }

    const converted = this.convert(value);
    const problem = this.validate?.(converted);
    if (problem !== undefined) throw BAD_REQUEST(problem);
    return converted;
  }

  convert(value: unknown): Scalar | unknown[] {
    if (this.valueType === Array) {
      if (Array.isArray(value)) return value;
      throw this.invalid(value);
    }
    return this.convertScalar(value);
  }

  /**
   * Converts a single value, as found in a write payload or a query string,
   * to the field's type
   */
  convertScalar(value: unknown): Scalar {
    const converted = this.coerce(value);
    if (converted === undefined) throw this.invalid(value);

    if (this.choices && !this.choices.some(([code]) => code === converted)) {
      throw BAD_REQUEST(
        `'${String(converted)}' is not a valid choice for the '${this.name}' field.`
      );
    }
    return converted;
  }

  protected blankValue(): unknown {
    if (this.valueType === String) return "";
    if (this.valueType === Array) return [];
    return undefined;
  }

  private coerce(value: unknown): Scalar | undefined {
    switch (this.valueType) {
      case String:
        if (typeof value === "string") return value;
        if (typeof value === "number" || typeof value === "boolean") {
          return String(value);
        }
        return undefined;
      case Number: {
        const number =
          typeof value === "number"
            ? value
            : typeof value === "string" && value.trim() !== ""
            ? Number(value)
            : NaN;
        return Number.isFinite(number) ? number : undefined;
      }
      case Boolean:
        if (typeof value === "boolean") return value;
        if (value === "true" || value === "1") return true;
        if (value === "false" || value === "0") return false;
        return undefined;
      case Date: {
        if (!(typeof value === "string" || value instanceof Date)) return undefined;
        const date = new Date(value);
        return Number.isNaN(date.getTime()) ? undefined : date;
      }
      default:
        return typeof value === "string" ? value : undefined;
    }
  }

  private invalid(value: unknown) {
    return BAD_REQUEST(
      `Invalid value for the '${this.name}' field: ${JSON.stringify(value)}.`
    );
  }
}

/////////////////////
// RELATED FIELDS //
/////////////////////

export interface RelatedFieldOptions extends FieldOptions {
  /**
   * Embed the related object's projection instead of its URI
   */
  full?: boolean;
}

export abstract class RelatedField extends ApiField {
  readonly dehydratedType = "related";
  readonly type = "related";
  readonly full: boolean;
  namespace: Namespace | null = null;

  constructor(readonly to: string, options: RelatedFieldOptions = {}) {
    super(options);
    this.full = options.full ?? false;
  }

  bind(namespace: Namespace) {
    this.namespace = namespace;
  }

  /**
   * The resource this field points at, looked up in the api the field is
   * bound to
   */
  get target(): ModelResource {
    if (!this.namespace) {
      throw new ApiFieldError(
        `The related field '${this.name}' is not bound to an api.`
      );
    }
    const { api, resourceName } = this.namespace;
    const resource = api.find(this.to);
    if (!resource) {
      throw new ApiFieldError(
        `The '${resourceName}.${this.name}' field points at the '${this.to}' resource, which is not registered in api '${api.apiName}'.`
      );
    }
    return resource;
  }

  protected async dehydrateRelated(bundle: Bundle, related: Entity) {
    const target = this.target;
    if (!this.full) return target.getResourceUri(related);

    const nested = await target.fullDehydrate(new Bundle(related, bundle.request));
    return nested.data;
  }

  protected async lookup(value: unknown): Promise<Entity | null> {
    if (isEntity(value)) return value;
    if (typeof value !== "string") return null;
    return (await this.target.store).findById(value);
  }
}

export class ToOneField extends RelatedField {
  async dehydrate(bundle: Bundle): Promise<unknown> {
    const value = await this.extract(bundle);
    if (value === undefined || value === null) return this.empty(bundle);

    const related = await this.lookup(value);
    if (!related) {
      throw new ApiFieldError(
        `The '${this.name}' field of '${bundle.obj.id}' refers to a missing ${this.to} '${String(value)}'.`
      );
    }
    return this.dehydrateRelated(bundle, related);
  }

  /**
   * Accepts a resource URI, a bare id or an object carrying either, and
   * stores the id of the related object
   */
  async hydrate(value: unknown): Promise<unknown> {
    if (value === null) {
      if (this.null) return null;
      throw BAD_REQUEST(`The '${this.name}' field doesn't allow a null value.`);
    }

    const target = this.target;
    const id = target.idFromValue(value);
    const related = id === null ? null : await (await target.store).findById(id);
    if (!related) {
      throw BAD_REQUEST(
        `Could not find the provided ${this.to} object via resource URI '${
          typeof value === "string" ? value : JSON.stringify(value)
        }'.`
      );
    }
    return related.id;
  }

  describe(): FieldDescription {
    return { ...super.describe(), related_type: "to_one" };
  }
}

export interface ToManyFieldOptions extends RelatedFieldOptions {
  /**
   * Attribute of the related records that holds this object's id. When set,
   * the field lists every related record pointing back at the object.
   */
  reverse?: string;
}

export class ToManyField extends RelatedField {
  readonly reverse: string | null;

  constructor(to: string, options: ToManyFieldOptions = {}) {
    super(to, { readonly: true, ...options });
    this.reverse = options.reverse ?? null;
  }

  get attributeName(): string | null {
    return this.reverse === null ? super.attributeName : null;
  }

  async dehydrate(bundle: Bundle): Promise<unknown> {
    const related = await this.related(bundle);
    if (related === null) return this.empty(bundle);

    const values: unknown[] = [];
    for (const item of related) {
      values.push(await this.dehydrateRelated(bundle, item));
    }
    return values;
  }

  async hydrate(): Promise<unknown> {
    throw BAD_REQUEST(`The '${this.name}' field is read-only.`);
  }

  describe(): FieldDescription {
    return { ...super.describe(), related_type: "to_many" };
  }

  private async related(bundle: Bundle): Promise<Entity[] | null> {
    if (this.reverse !== null) {
      const store = await this.target.store;
      return store.filter({ [this.reverse]: { $eq: bundle.obj.id } });
    }

    const value = await this.extract(bundle);
    if (value === undefined || value === null) return null;
    if (!Array.isArray(value)) {
      throw new ApiFieldError(
        `The '${this.name}' field of '${bundle.obj.id}' did not produce a list.`
      );
    }

    const related: Entity[] = [];
    for (const item of value) {
      const entity = await this.lookup(item);
      if (!entity) {
        throw new ApiFieldError(
          `The '${this.name}' field of '${bundle.obj.id}' refers to a missing ${this.to} '${String(item)}'.`
        );
      }
      related.push(entity);
    }
    return related;
  }
}

//////////////////
// CONSTRUCTORS //
//////////////////

export const fields = {
  attribute: (type: FieldType, options?: AttributeFieldOptions) =>
    new AttributeField(type, options),
  toOne: (to: string, options?: RelatedFieldOptions) => new ToOneField(to, options),
  toMany: (to: string, options?: ToManyFieldOptions) => new ToManyField(to, options),
};

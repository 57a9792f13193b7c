import { Bundle } from "./bundle";
import { ApiField, RelatedField } from "./fields";
import { fieldEntries } from "./model";
import { ModelResource, ResourceOptions } from "./resource";

export interface AdditionalResourceOptions extends ResourceOptions {
  /**
   * Fields only projected for detail requests, typically relationships that
   * are expensive to resolve for every object of a list
   */
  additionalDetailFields?: Readonly<Record<string, ApiField>>;
}

/**
 * A resource that publishes more on a detail request than on a list
 * request, and whose fields honour the `blank` marker of the model schema.
 */
export class AdditionalModelResource extends ModelResource {
  readonly additionalDetailFields: ReadonlyMap<string, ApiField>;

  constructor(options: AdditionalResourceOptions) {
    super(options);

    const additional = new Map(Object.entries(options.additionalDetailFields ?? {}));
    for (const [name, field] of additional) field.contribute(name);
    this.additionalDetailFields = additional;
  }

  /**
   * Model attributes that may be left out of a write are published as blank
   */
  protected postProcessFields(fields: Map<string, ApiField>) {
    for (const [name, modelField] of fieldEntries(this.model)) {
      const field = fields.get(name);
      if (field && modelField.blank) field.blank = true;
    }
  }

  findField(name: string): ApiField | undefined {
    const field = super.findField(name) ?? this.additionalDetailFields.get(name);
    if (field instanceof RelatedField) field.bind(this.namespace);
    return field;
  }

  /**
   * A request is a detail request exactly when its path is the URI of the
   * object being projected. Listing a single object is not a detail request.
   */
  isDetailRequest(bundle: Bundle) {
    return this.getResourceUri(bundle.obj) === bundle.request.path;
  }

  protected async dehydrate(bundle: Bundle): Promise<Bundle> {
    if (this.isDetailRequest(bundle)) await this.detailDehydrate(bundle);
    return super.dehydrate(bundle);
  }

  protected async detailDehydrate(bundle: Bundle) {
    const namespace = this.namespace;
    for (const [name, field] of this.additionalDetailFields) {
      if (field instanceof RelatedField) field.bind(namespace);
      await this.dehydrateField(bundle, name, field);
    }
  }

  buildSchema() {
    const schema = super.buildSchema();
    return {
      ...schema,
      fields: {
        ...schema.fields,
        ...Object.fromEntries(
          [...this.additionalDetailFields].map(([name, field]) => [
            name,
            { ...field.describe(), detail_only: true },
          ])
        ),
      },
    };
  }
}

import {
  AdditionalModelResource,
  ALL,
  Model,
  fields,
} from "@jquest/resources-core";

export const Instance: Model = {
  name: "Instance",

  fields: {
    slug: { type: String, unique: true },
    name: { type: String },
    host: { type: String, blank: true, default: "" },
  },
};

export const instanceResource = () =>
  new AdditionalModelResource({
    resourceName: "instance",
    model: Instance,
    additionalDetailFields: {
      missions: fields.toMany("mission", {
        reverse: "instance",
        full: true,
        null: true,
      }),
    },
    alwaysReturnData: true,
    filtering: {
      slug: ALL,
      name: ALL,
      host: ALL,
      missions__id: ALL,
    },
  });

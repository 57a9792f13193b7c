import { Model, ModelResource } from "@jquest/resources-core";

export const Language: Model = {
  name: "Language",

  fields: {
    code: { type: String, unique: true },
    name: { type: String },
  },
};

export const languageResource = () =>
  new ModelResource({
    resourceName: "language",
    model: Language,
    alwaysReturnData: true,
  });

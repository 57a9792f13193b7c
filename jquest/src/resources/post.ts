import { Model, ModelResource, fields } from "@jquest/resources-core";

export const Post: Model = {
  name: "Post",

  fields: {
    title: { type: String },
    content: { type: String, blank: true, default: "" },
    language: { type: String, null: true, references: "Language" },
    created_at: { type: Date, default: () => new Date() },
  },
};

export const postResource = () =>
  new ModelResource({
    resourceName: "post",
    model: Post,
    fields: {
      language: fields.toOne("language", { null: true }),
    },
    alwaysReturnData: true,
  });

import {
  ALL,
  ALL_WITH_RELATIONS,
  Model,
  ModelResource,
  fields,
} from "@jquest/resources-core";

export const UserToken: Model = {
  name: "UserToken",

  fields: {
    token: { type: String, unique: true },
    user: { type: String, references: "User" },
    created_at: { type: Date, default: () => new Date() },
  },
};

export const userTokenResource = () =>
  new ModelResource({
    resourceName: "user_token",
    model: UserToken,
    fields: {
      user: fields.toOne("user", { full: true }),
    },
    alwaysReturnData: true,
    filtering: {
      user: ALL_WITH_RELATIONS,
      token: ALL,
      created_at: ALL,
    },
  });

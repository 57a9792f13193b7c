import {
  ALL,
  ALL_WITH_RELATIONS,
  Model,
  ModelResource,
  fields,
} from "@jquest/resources-core";

export const UserOauth: Model = {
  name: "UserOauth",

  fields: {
    consumer: { type: String, helpText: "OAuth provider, e.g. github" },
    consumer_user_id: { type: String },
    user: { type: String, references: "User" },
  },
};

export const userOauthResource = () =>
  new ModelResource({
    resourceName: "user_oauth",
    model: UserOauth,
    fields: {
      user: fields.toOne("user", { full: true }),
    },
    alwaysReturnData: true,
    filtering: {
      consumer_user_id: ALL,
      consumer: ALL,
      user: ALL_WITH_RELATIONS,
    },
  });

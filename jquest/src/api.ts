import { Api, Authentication, Supplier } from "@jquest/resources-core";
import { instanceResource } from "./resources/instance";
import { languageResource } from "./resources/language";
import { missionResource } from "./resources/mission";
import { missionRelationshipResource } from "./resources/mission-relationship";
import { postResource } from "./resources/post";
import { UserResource } from "./resources/user";
import { userOauthResource } from "./resources/user-oauth";
import { userProgressionResource } from "./resources/user-progression";
import { userTokenResource } from "./resources/user-token";

export interface JquestApiOptions {
  supplier: Supplier;
  authentication: Authentication;
  apiName?: string;
  basePath?: string;
}

/**
 * Builds the api with every jquest resource registered
 */
export const createApi = ({
  supplier,
  authentication,
  apiName = "v1",
  basePath = "/api",
}: JquestApiOptions) =>
  new Api({ apiName, basePath, supplier, authentication })
    .register(new UserResource())
    .register(userProgressionResource())
    .register(userOauthResource())
    .register(userTokenResource())
    .register(instanceResource())
    .register(missionResource())
    .register(missionRelationshipResource())
    .register(languageResource())
    .register(postResource());

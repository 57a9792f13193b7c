import {
  AdditionalModelResource,
  ALL,
  BAD_REQUEST,
  Bundle,
  Model,
  RequestContext,
  fields,
  isPlainObject,
} from "@jquest/resources-core";
import { UserOauth } from "./user-oauth";

//////////////////////
// MODEL DEFINITION //
//////////////////////

export const User: Model = {
  name: "User",

  fields: {
    username: { type: String, unique: true },
    first_name: { type: String, blank: true, default: "" },
    last_name: { type: String, blank: true, default: "" },
    email: { type: String, blank: true, default: "" },
    password: { type: String, default: "" },
    is_active: { type: Boolean, default: true },
    is_staff: { type: Boolean, default: false },
    is_superuser: { type: Boolean, default: false },
    date_joined: { type: Date, default: () => new Date() },
    last_login: { type: Date, null: true, blank: true },
    user_permissions: {
      type: Array,
      blank: true,
      helpText: "Permission codenames, e.g. add_mission",
    },
  },
};

/////////////
// HELPERS //
/////////////

type OauthPayload = { consumer: string; consumer_user_id: string };

const toOauthPayload = (value: unknown): OauthPayload => {
  if (isPlainObject(value)) {
    const { consumer, consumer_user_id } = value;
    if (
      typeof consumer === "string" &&
      (typeof consumer_user_id === "string" || typeof consumer_user_id === "number")
    ) {
      return { consumer, consumer_user_id: String(consumer_user_id) };
    }
  }
  throw BAD_REQUEST(
    "Each entry of 'oauths' needs a 'consumer' and a 'consumer_user_id'."
  );
};

/**
 * Reads the `oauths` key of an account payload: a list of links or a
 * single link. Any other shape is refused.
 */
export const parseOauths = (value: unknown): OauthPayload[] => {
  if (Array.isArray(value)) return value.map(toOauthPayload);
  if (isPlainObject(value)) return [toOauthPayload(value)];
  throw BAD_REQUEST("The 'oauths' field must be a list or a single object.");
};

//////////////
// RESOURCE //
//////////////

export class UserResource extends AdditionalModelResource {
  constructor() {
    super({
      resourceName: "user",
      model: User,
      excludes: ["password", "last_login", "email", "user_permissions"],
      alwaysReturnData: true,
      filtering: {
        date_joined: ALL,
        first_name: ALL,
        id: ALL,
        is_active: ALL,
        is_staff: ALL,
        is_superuser: ALL,
        last_name: ALL,
        resource_uri: ALL,
        username: ALL,
      },
      additionalDetailFields: {
        progressions: fields.toMany("user_progression", {
          reverse: "user",
          full: true,
          null: true,
        }),
      },
    });
  }

  /**
   * Creates the account, then one OAuth link per entry of `oauths`. When a
   * link cannot be stored, the account and the links stored so far are
   * deleted again before the error is rethrown.
   */
  async objCreate(data: unknown, request: RequestContext): Promise<Bundle> {
    const oauths =
      isPlainObject(data) && data.oauths !== undefined ? parseOauths(data.oauths) : [];

    const bundle = await super.objCreate(data, request);

    const store = await this.api.supplier.store(UserOauth);
    const linked: string[] = [];
    try {
      for (const oauth of oauths) {
        linked.push((await store.insert({ ...oauth, user: bundle.obj.id })).id);
      }
    } catch (error) {
      for (const id of linked) await store.delete(id);
      await this.objDelete(bundle.obj);
      throw error;
    }

    return bundle;
  }
}

import { Model, ModelResource, fields } from "@jquest/resources-core";

////////////
// CONSTS //
////////////

export const PROGRESSION_STATES = [
  ["pending", "Pending"],
  ["accepted", "Accepted"],
  ["refused", "Refused"],
  ["succeeded", "Succeeded"],
  ["failed", "Failed"],
] as const;

const STATE_LABELS = new Map<unknown, string>(PROGRESSION_STATES);

/**
 * Display label of a state code, or null for a code outside the enumeration
 */
export const stateLabel = (code: unknown) => STATE_LABELS.get(code) ?? null;

//////////////////////
// MODEL DEFINITION //
//////////////////////

export const UserProgression: Model = {
  name: "UserProgression",

  fields: {
    user: { type: String, references: "User" },
    mission: { type: String, references: "Mission" },
    state: { type: String, default: "pending", choices: PROGRESSION_STATES },
  },
};

//////////////
// RESOURCE //
//////////////

export const userProgressionResource = () =>
  new ModelResource({
    resourceName: "user_progression",
    model: UserProgression,
    fields: {
      user: fields.toOne("user"),
      mission: fields.toOne("mission"),
    },
    alwaysReturnData: true,
    dehydrate: {
      state: (bundle) => stateLabel(bundle.data.state),
    },
  });

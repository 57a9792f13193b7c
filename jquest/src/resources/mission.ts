import {
  ALL,
  Model,
  ModelResource,
  buildAbsoluteUri,
  fields,
  isResolvablePath,
} from "@jquest/resources-core";

export const Mission: Model = {
  name: "Mission",

  fields: {
    name: { type: String },
    description: { type: String, blank: true, default: "" },
    instance: { type: String, references: "Instance" },
    image: { type: String, null: true, blank: true, helpText: "Path of the mission's image" },
  },
};

export const missionResource = () =>
  new ModelResource({
    resourceName: "mission",
    model: Mission,
    fields: {
      image: fields.attribute(String, {
        null: true,
        helpText: "Path of the mission's image",
        validate: (value) =>
          typeof value === "string" && value !== "" && !isResolvablePath(value)
            ? `The 'image' field needs a path or URL, not '${value}'.`
            : undefined,
      }),
      instance: fields.toOne("instance"),
      relationships: fields.toMany("mission_relationship", {
        reverse: "mission",
        full: true,
        null: true,
      }),
    },
    alwaysReturnData: true,
    filtering: {
      name: ALL,
      instance: ALL,
    },
    dehydrate: {
      // Paths become absolute URLs on the host the request came in on.
      // Stored values that do not resolve are published as null.
      image: ({ data, request }) =>
        typeof data.image === "string" && data.image !== ""
          ? buildAbsoluteUri(request, data.image)
          : null,
    },
  });

import { Model, ModelResource, fields } from "@jquest/resources-core";

export const MissionRelationship: Model = {
  name: "MissionRelationship",

  fields: {
    parent: { type: String, references: "Mission" },
    mission: { type: String, references: "Mission" },
  },
};

export const missionRelationshipResource = () =>
  new ModelResource({
    resourceName: "mission_relationship",
    model: MissionRelationship,
    fields: {
      parent: fields.toOne("mission"),
      mission: fields.toOne("mission"),
    },
  });

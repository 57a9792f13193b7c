import type { ModelResource } from "./resource";
import { BAD_REQUEST } from "./errors";
import { AttributeField, RelatedField, ToManyField, ToOneField } from "./fields";
import { Condition, Query, intersect } from "./supplier";

/**
 * Exact lookups on the field itself
 */
export const ALL = "all";

/**
 * Exact lookups on the field, and `field__sub` lookups that follow a
 * relationship into the target resource, subject to the target's own
 * filtering
 */
export const ALL_WITH_RELATIONS = "all_with_relations";

export type FilterPolicy = typeof ALL | typeof ALL_WITH_RELATIONS;

export type Filtering = Readonly<Partial<Record<string, FilterPolicy>>>;

/**
 * Query parameters that never name a filter
 */
export const RESERVED_PARAMS: readonly string[] = ["limit", "offset", "format"];

const LOOKUP_SEPARATOR = "__";

/**
 * Turns the query string of a list request into a store query. Conditions on
 * the same attribute are intersected.
 */
export async function buildQuery(
  resource: ModelResource,
  params: Readonly<Record<string, string>>
): Promise<Query> {
  const query: Record<string, Condition> = {};

  for (const [key, value] of Object.entries(params)) {
    if (RESERVED_PARAMS.includes(key)) continue;

    const [attribute, condition] = await buildCondition(resource, key, value, true);
    const previous = query[attribute];
    query[attribute] = previous ? intersect(previous, condition) : condition;
  }

  return query;
}

async function buildCondition(
  resource: ModelResource,
  key: string,
  value: string,
  enforce: boolean
): Promise<[attribute: string, condition: Condition]> {
  const [head, ...rest] = key.split(LOOKUP_SEPARATOR);
  const nested = enforce ? checkFiltering(resource, head, key, rest.length > 0) : false;

  const field = resource.findField(head);
  if (!field) throw BAD_REQUEST(`The '${head}' field is not a valid field.`);

  if (rest.length === 0) {
    if (head === "resource_uri") {
      return ["id", { $eq: resource.idFromValue(value) ?? value }];
    }

    if (field instanceof ToManyField) {
      return buildRelatedCondition(field, "id", field.target.idFromValue(value) ?? value, false);
    }

    const attribute = field.attributeName;
    if (attribute === null) {
      throw BAD_REQUEST(`The '${head}' field cannot be filtered.`);
    }

    if (field instanceof ToOneField) {
      return [attribute, { $eq: field.target.idFromValue(value) ?? value }];
    }

    if (field instanceof AttributeField) {
      return [
        attribute,
        { $eq: field.valueType === Array ? value : field.convertScalar(value) },
      ];
    }

    throw BAD_REQUEST(`The '${head}' field cannot be filtered.`);
  }

  if (!(field instanceof RelatedField)) {
    throw BAD_REQUEST(`The '${head}' field is not a related field.`);
  }
  return buildRelatedCondition(field, rest.join(LOOKUP_SEPARATOR), value, nested);
}

/**
 * Checks that the resource allows the lookup. Returns whether the target
 * resource's filtering applies to the rest of the lookup.
 */
function checkFiltering(
  resource: ModelResource,
  head: string,
  key: string,
  hasLookup: boolean
) {
  // A lookup declared verbatim is allowed as is
  if (hasLookup && resource.filtering[key] !== undefined) return false;

  const policy = resource.filtering[head];
  if (policy === undefined) {
    throw BAD_REQUEST(`The '${head}' field does not allow filtering.`);
  }
  if (hasLookup && policy !== ALL_WITH_RELATIONS) {
    throw BAD_REQUEST(
      `Lookups are not allowed more than one level deep on the '${head}' field.`
    );
  }
  return true;
}

async function buildRelatedCondition(
  field: RelatedField,
  lookup: string,
  value: string,
  enforce: boolean
): Promise<[string, Condition]> {
  const target = field.target;
  const [subAttribute, subCondition] = await buildCondition(target, lookup, value, enforce);
  const related = await (await target.store).filter({ [subAttribute]: subCondition });

  if (field instanceof ToManyField) {
    if (field.reverse === null) {
      throw BAD_REQUEST(`The '${field.name}' field cannot be filtered.`);
    }
    const reverse = field.reverse;
    return [
      "id",
      {
        $in: related
          .map((item) => item[reverse])
          .filter((id): id is string => typeof id === "string"),
      },
    ];
  }

  const attribute = field.attributeName;
  if (attribute === null) {
    throw BAD_REQUEST(`The '${field.name}' field cannot be filtered.`);
  }
  return [attribute, { $in: related.map((item) => item.id) }];
}

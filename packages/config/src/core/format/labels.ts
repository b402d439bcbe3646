import type { ValueKind } from "../../ports/value"
import type { Blueprint } from "../blueprint"

/** Words used in the generated documentation comments. */
export type DocumentationLabels = Readonly<{
  type: string
  default: string
  minimum: string
  maximum: string
  formats: string
  kinds: Readonly<Record<ValueKind, string>>
}>

export const defaultDocumentationLabels: DocumentationLabels = {
  type: "Type",
  default: "Default",
  minimum: "Minimum",
  maximum: "Maximum",
  formats: "Formats",
  kinds: {
    text: "Text",
    integer: "Integer",
    decimal: "Decimal",
    boolean: "Boolean",
    list: "List",
    dict: "Dictionary",
    null: "Null",
  },
}

/**
 * Human label for the kinds a blueprint accepts, e.g. `Integer, Null` or
 * `List[Integer]`. Item kinds are shown only when narrower than the default.
 */
export function typeLabel(
  blueprint: Blueprint,
  labels: DocumentationLabels = defaultDocumentationLabels,
): string {
  const items = blueprint.itemKinds.map((kind) => labels.kinds[kind])
  const narrow = blueprint.hasNarrowItemKinds

  return blueprint.kinds
    .map((kind) => {
      const name = labels.kinds[kind]
      if (!narrow) return name

      if (kind === "list") return `${name}[${items.join(", ")}]`
      if (kind === "dict") {
        const values = items.length > 1 ? `[${items.join(", ")}]` : items.join("")
        return `${name}[${labels.kinds.text}, ${values}]`
      }
      return name
    })
    .join(", ")
}

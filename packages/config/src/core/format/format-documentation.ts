import { Blueprint } from "../blueprint"
import type { Schema } from "../schema"
import { type RenderOptions, renderConfigText } from "../text/config-renderer"
import { describeBlueprint } from "./comments"
import { defaultDocumentationLabels } from "./labels"

export type DocumentationOptions = RenderOptions

/**
 * Documentation for a whole schema (the file generated from defaults) or the
 * comment block of a single blueprint.
 */
export function formatDocumentation(
  target: Schema | Blueprint,
  options: DocumentationOptions = {},
): string {
  if (target instanceof Blueprint) {
    return describeBlueprint(target, options.labels ?? defaultDocumentationLabels).join("\n")
  }

  return renderConfigText(target, (blueprint) => blueprint.default, options)
}

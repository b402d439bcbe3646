import type { Value } from "../../ports/value"
import type { Blueprint } from "../blueprint"
import { encodeValue } from "../codec/encoder"
import { commentLines, describeBlueprint, formatHeader, type HeaderInfo } from "../format/comments"
import { type DocumentationLabels, defaultDocumentationLabels } from "../format/labels"
import type { Schema } from "../schema"

export type RenderOptions = {
  /** First comment line, `<name> - Version: <version>`. Omitted when null. */
  header?: HeaderInfo | null
  /** Free text written as comments under the header. */
  description?: string
  labels?: DocumentationLabels
}

/**
 * Full configuration file for `schema`, taking each option's value from
 * `valueOf`. Sections and options follow schema order; literals use the
 * pretty style.
 */
export function renderConfigText(
  schema: Schema,
  valueOf: (blueprint: Blueprint) => Value,
  options: RenderOptions = {},
): string {
  const labels = options.labels ?? defaultDocumentationLabels
  const lines: string[] = []

  if (options.header) lines.push(...commentLines(formatHeader(options.header)), "")
  if (options.description) lines.push(...commentLines(options.description), "")

  for (const section of schema.sections()) {
    lines.push(`[${section}]`)

    schema.optionsOf(section).forEach((blueprint, i) => {
      if (i > 0) lines.push("")

      lines.push(...describeBlueprint(blueprint, labels))
      lines.push(assignmentLine(blueprint.option, valueOf(blueprint)))
    })

    lines.push("")
  }

  return lines.join("\n")
}

export function assignmentLine(option: string, value: Value): string {
  const literal = encodeValue(value, { style: "pretty" })

  return literal === "" ? `${option} =` : `${option} = ${literal}`
}

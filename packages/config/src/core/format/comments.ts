import type { Blueprint } from "../blueprint"
import { encodeValue } from "../codec/encoder"
import { type DocumentationLabels, defaultDocumentationLabels, typeLabel } from "./labels"

export type HeaderInfo = Readonly<{
  name: string
  version: string
}>

/** One `# ` comment line per line of `text`; blank lines become a bare `#`. */
export function commentLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/).map((line) => (line === "" ? "#" : `# ${line}`))
}

export function formatHeader(header: HeaderInfo): string {
  return `${header.name} - Version: ${header.version}`
}

/** Comment block written above an option in the file. */
export function describeBlueprint(
  blueprint: Blueprint,
  labels: DocumentationLabels = defaultDocumentationLabels,
): string[] {
  const lines = blueprint.description === "" ? [] : commentLines(blueprint.description)
  const fallback = blueprint.default.kind === "null" ? "null" : encodeValue(blueprint.default)

  lines.push(`# ${labels.type}: ${typeLabel(blueprint, labels)}`)
  lines.push(`# ${labels.default}: ${fallback}`)

  if (blueprint.min !== undefined) lines.push(`# ${labels.minimum}: ${blueprint.min}`)
  if (blueprint.max !== undefined) lines.push(`# ${labels.maximum}: ${blueprint.max}`)
  if (blueprint.patterns.size > 0) {
    lines.push(`# ${labels.formats}: ${[...blueprint.patterns.keys()].join(", ")}`)
  }

  return lines
}

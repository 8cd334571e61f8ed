export interface ManifestEntry {
  /** Distribution name, e.g. "selenium" */
  name: string
  /** Full requirement as written, e.g. "selenium>=4.0" */
  spec: string
  /** 1-based line number in the manifest */
  line: number
}

/**
 * A line pip acts on: a requirement, an option such as `-r base.txt`
 * or `-e .`, or a path or URL to a distribution
 */
export interface ManifestLine {
  text: string
  line: number
}

const NAME_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)/

/**
 * Lines of the manifest left after dropping blanks and comments
 */
export function manifestLines(content: string): ManifestLine[] {
  const lines: ManifestLine[] = []

  content.split(/\r?\n/).forEach((rawLine, index) => {
    const text = rawLine.replace(/(^|\s)#.*$/, '').trim()
    if (text) lines.push({ text, line: index + 1 })
  })

  return lines
}

/**
 * Distribution name at the start of a requirement, e.g. "pdfkit" for "pdfkit==1.0"
 */
export function requirementName(requirement: string): string | undefined {
  return NAME_PATTERN.exec(requirement.trim())?.[1]
}

/**
 * Parse the named requirements of a requirements-style manifest.
 * Option lines (-r, -e, --index-url, ...) and paths yield no entry.
 */
export function parseManifest(content: string): ManifestEntry[] {
  const entries: ManifestEntry[] = []

  for (const { text, line } of manifestLines(content)) {
    if (text.startsWith('-')) continue

    const name = requirementName(text)
    if (!name || /^[./:]/.test(text.slice(name.length))) continue

    entries.push({ name, spec: text, line })
  }

  return entries
}

/**
 * Normalize a distribution name for comparison ("Py_PDF.Kit" -> "py-pdf-kit")
 */
export function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, '-')
}

/**
 * Find the manifest entry an installer diagnostic refers to
 */
export function findEntry(entries: ManifestEntry[], requirement: string): ManifestEntry | undefined {
  const name = requirementName(requirement)
  if (!name) return undefined
  const wanted = normalizeName(name)
  return entries.find((entry) => normalizeName(entry.name) === wanted)
}

import fs from "fs/promises";
import { SequenceDocumentError } from "../errors.js";
import { extractSteps } from "./steps.js";
import { Step } from "./types.js";

// "## extra_config (BETA)" -> name "extra_config"
const SECTION_HEADING = /^##\s+(\S+)(?:\s+\(([^)]*)\))?\s*$/;
const SECTION_END = /^#{1,2}\s/;

export function listSequenceNames(document: string): string[] {
  const names: string[] = [];
  for (const line of document.split(/\r?\n/)) {
    const match = line.match(SECTION_HEADING);
    if (match) names.push(match[1]);
  }
  return names;
}

/**
 * Body of the `## <name>` section, without its heading, up to the next
 * level-1 or level-2 heading. Undefined when the section does not exist.
 */
export function findSequenceSection(document: string, name: string): string | undefined {
  const lines = document.split(/\r?\n/);
  const start = lines.findIndex((line) => line.match(SECTION_HEADING)?.[1] === name);
  if (start < 0) return undefined;

  const rest = lines.slice(start + 1);
  const end = rest.findIndex((line) => SECTION_END.test(line));
  return (end < 0 ? rest : rest.slice(0, end)).join("\n");
}

export async function readDocument(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SequenceDocumentError(`Cannot read sequence document ${filePath}: ${reason}`);
  }
}

/**
 * Steps of the named section of a sequences document, or of the whole
 * document when no name is given.
 */
export async function readSequenceSteps(filePath: string, name?: string): Promise<Step[]> {
  const document = await readDocument(filePath);
  if (name === undefined) return extractSteps(document);

  const section = findSequenceSection(document, name);
  if (section === undefined) {
    const known = listSequenceNames(document);
    throw new SequenceDocumentError(
      `No sequence "${name}" in ${filePath}` +
        (known.length ? ` (known: ${known.join(", ")})` : " (document has no sequences)"),
    );
  }
  return extractSteps(section);
}

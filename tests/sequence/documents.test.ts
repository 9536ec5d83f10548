import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { SequenceDocumentError } from "../../src/errors.js";
import { findSequenceSection, listSequenceNames, readSequenceSteps } from "../../src/sequence/documents.js";
import { extractSteps } from "../../src/sequence/steps.js";

const DOCUMENT = `# Sequences

## extra_config (BETA)

Check that the device handles an extra field

1. Update config with an extra field:
    * Add \`extra_field\` = \`extra_value\`
1. Wait for last_config to update

## empty_enumeration (PREVIEW)

Check enumeration of nothing at all

1. Wait for enumeration not active
1. Check that no family enumeration

### Notes

Trailing notes stay in the section.

## plain_sequence

1. Only step
`;

const tmpDirs: string[] = [];

const writeTmp = async (name: string, content: string): Promise<string> => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "sequence-docs-"));
  tmpDirs.push(dir);
  const file = path.join(dir, name);
  await fs.writeFile(file, content, "utf-8");
  return file;
};

describe("sequence documents", () => {
  afterEach(async () => {
    await Promise.all(tmpDirs.map((dir) => fs.rm(dir, { recursive: true, force: true })));
    tmpDirs.length = 0;
  });

  it("lists level-2 sequence names without their stage", () => {
    expect(listSequenceNames(DOCUMENT)).toEqual(["extra_config", "empty_enumeration", "plain_sequence"]);
  });

  it("finds a section up to the next level-2 heading", () => {
    const section = findSequenceSection(DOCUMENT, "extra_config");
    expect(section).toBe(
      [
        "",
        "Check that the device handles an extra field",
        "",
        "1. Update config with an extra field:",
        "    * Add `extra_field` = `extra_value`",
        "1. Wait for last_config to update",
        "",
      ].join("\n"),
    );
  });

  it("keeps deeper headings inside the section", () => {
    const section = findSequenceSection(DOCUMENT, "empty_enumeration");
    expect(section === undefined ? [] : extractSteps(section)).toEqual([
      ["1. Wait for enumeration not active"],
      ["1. Check that no family enumeration", "", "### Notes", "", "Trailing notes stay in the section."],
    ]);
  });

  it("does not match a name by prefix", () => {
    expect(findSequenceSection(DOCUMENT, "extra")).toBeUndefined();
  });

  it("reads the steps of a named section", async () => {
    const file = await writeTmp("sequences.md", DOCUMENT);
    await expect(readSequenceSteps(file, "plain_sequence")).resolves.toEqual([["1. Only step"]]);
  });

  it("reads every step of a document when no name is given", async () => {
    const file = await writeTmp("sequence.md", "1. First\n  * detail\n1. Second\n");
    await expect(readSequenceSteps(file)).resolves.toEqual([["1. First", "  * detail"], ["1. Second"]]);
  });

  it("names the known sequences when a section is missing", async () => {
    const file = await writeTmp("sequences.md", DOCUMENT);
    await expect(readSequenceSteps(file, "missing")).rejects.toThrow(
      `No sequence "missing" in ${file} (known: extra_config, empty_enumeration, plain_sequence)`
    );
  });

  it("reports unreadable documents", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "sequence-docs-"));
    tmpDirs.push(dir);
    await expect(readSequenceSteps(path.join(dir, "absent.md"))).rejects.toBeInstanceOf(SequenceDocumentError);
  });
});

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { gunzipSync } from "node:zlib";

import { GrampsXmlWriter, formatDate } from "../../src/tree/GrampsXmlWriter.js";
import { generateTree } from "../../src/tree/TreeGenerator.js";
import { makeSampleTree } from "../helpers/sampleTree.js";

const CREATED = new Date("2024-03-01T12:00:00Z");

describe("GrampsXmlWriter", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "gramps-xml-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("formats dates as zero-padded ISO dates", () => {
    expect(formatDate({ year: 1612, month: 3, day: 9 })).toBe("1612-03-09");
    expect(formatDate({ year: 987, month: 12, day: 31 })).toBe("0987-12-31");
  });

  it("renders the header and every object of the tree", async () => {
    const xml = await new GrampsXmlWriter().render(makeSampleTree(), CREATED);
    const lines = xml.split("\n");

    expect(lines[0]).toBe('<?xml version="1.0" encoding="UTF-8"?>');
    expect(lines).toEqual(
      expect.arrayContaining([
        '<database xmlns="http://gramps-project.org/xml/1.7.1/">',
        '    <created date="2024-03-01" version="5.2.0"/>',
        "    <mediapath>/data</mediapath>",
        '    <event handle="_p0-birth" change="1700000000" id="E0000">',
        "      <type>Birth</type>",
        '      <dateval val="1985-01-02"/>',
        '      <place hlink="_pl0"/>',
        "      <description>Birth of Weber, Anna</description>",
        '  <people home="_p0">',
        '    <person handle="_p0" change="1700000000" id="I0000">',
        "      <gender>F</gender>",
        "        <first>Anna</first>",
        "        <surname>Weber</surname>",
        '      <eventref hlink="_p0-birth" role="Primary"/>',
        '      <objref hlink="_m0"/>',
        '      <childof hlink="_f0"/>',
        '      <noteref hlink="_n0"/>',
        '      <parentin hlink="_f0"/>',
        '    <family handle="_f0" change="1700000000" id="F0000">',
        '      <rel type="Married"/>',
        '      <father hlink="_p1"/>',
        '      <mother hlink="_p2"/>',
        '      <childref hlink="_p0"/>',
        '    <placeobj handle="_pl0" change="1700000000" id="P0000" type="Town">',
        "      <pname value=\"Musterstadt\"/>",
        '      <coord long="13.405" lat="52.52"/>',
        '      <file src="images/people/color/00001.jpg" mime="image/jpeg" checksum="0cc175b9c0f1b6a831c399e269772661" description="Weber, Anna"/>',
        '    <note handle="_n0" change="1700000000" id="N0000" type="Person Note">',
      ])
    );
    expect(xml.trimEnd().endsWith("</database>")).toBe(true);
  });

  it("writes sections in the order the Gramps DTD requires", async () => {
    const xml = await new GrampsXmlWriter().render(makeSampleTree(), CREATED);
    const order = ["<header>", "<events>", "<people ", "<families>", "<places>", "<objects>", "<notes>"].map((tag) =>
      xml.indexOf(tag)
    );

    expect(order.every((index) => index >= 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
  });

  it("escapes markup in text", async () => {
    const xml = await new GrampsXmlWriter().render(makeSampleTree(), CREATED);

    expect(xml).toContain("      <text>Tom &amp; Jerry &lt;3 &quot;quoted&quot;</text>");
  });

  it("leaves out empty sections", async () => {
    const tree = makeSampleTree();
    tree.media.clear();
    const child = tree.people.get("p0");
    if (child) child.mediaHandles = [];

    const xml = await new GrampsXmlWriter().render(tree, CREATED);

    expect(xml).not.toContain("<objects>");
    expect(xml).not.toContain("<objref");
  });

  it("emits one element per generated person and family", async () => {
    const tree = generateTree({ seed: 5, generations: 3, currentYear: 2024, changed: 1700000000 });
    const xml = await new GrampsXmlWriter().render(tree, CREATED);

    expect(xml.match(/<person handle=/g)?.length).toBe(tree.people.size);
    expect(xml.match(/<family handle=/g)?.length).toBe(tree.families.size);
    expect(xml.match(/<event handle=/g)?.length).toBe(tree.events.size);
    expect(xml.match(/<note handle=/g)?.length).toBe(tree.notes.size);
  });

  it("writes plain XML by default", async () => {
    const writer = new GrampsXmlWriter();
    const outputPath = path.join(tmpDir, "random_tree.gramps");
    const result = await writer.write(makeSampleTree(), outputPath, { created: CREATED });
    const contents = await fs.readFile(outputPath, "utf8");

    expect(result).toEqual({ path: outputPath, sizeBytes: Buffer.byteLength(contents), compressed: false });
    expect(contents).toBe(await writer.render(makeSampleTree(), CREATED));
  });

  it("gzips the output when asked", async () => {
    const outputPath = path.join(tmpDir, "random_tree.gramps");
    const result = await new GrampsXmlWriter().write(makeSampleTree(), outputPath, { compress: true, created: CREATED });
    const xml = gunzipSync(await fs.readFile(outputPath)).toString("utf8");

    expect(result.compressed).toBe(true);
    expect(xml.startsWith('<?xml version="1.0" encoding="UTF-8"?>')).toBe(true);
  });
});

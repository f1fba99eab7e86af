import { describe, it, expect } from "vitest";
import {
  parseStatusDocument,
  extractTags,
  findFailureMarker,
  StatusDocument,
} from "./status.js";

const VALIDATE_REPLY = [
  "Connecting to server...",
  '<tree message="SUCCESS" desc="VALID ACCOUNT" configstatus="SET" configtype="DEFAULT"/>',
  "done",
].join("\n");

describe("extractTags", () => {
  it("keeps only tag-like substrings", () => {
    expect(extractTags('noise <a x="1"/> more <b/> end')).toEqual([
      '<a x="1"/>',
      "<b/>",
    ]);
  });

  it("drops declarations and processing instructions", () => {
    expect(extractTags('<?xml version="1.0"?><!DOCTYPE x><tree/>')).toEqual([
      "<tree/>",
    ]);
  });
});

describe("parseStatusDocument", () => {
  it("reads attributes of the tree element out of mixed text", () => {
    const doc = parseStatusDocument(VALIDATE_REPLY);

    expect(doc).toBeInstanceOf(StatusDocument);
    expect(doc?.find("tree")).toEqual({
      message: "SUCCESS",
      desc: "VALID ACCOUNT",
      configstatus: "SET",
      configtype: "DEFAULT",
    });
  });

  it("returns null when there are no tags", () => {
    expect(parseStatusDocument("connection refused\n")).toBeNull();
    expect(parseStatusDocument("")).toBeNull();
  });

  it("returns null when the tags are not well formed", () => {
    expect(parseStatusDocument("<tree></item>")).toBeNull();
    expect(parseStatusDocument("2 < 3 and 4 > 1")).toBeNull();
  });

  it("keeps elements in document order, including nested ones", () => {
    const doc = parseStatusDocument(
      '<tree message="SUCCESS"> <item name="a"/> <item name="b"/> </tree><other/>',
    );

    expect(doc?.elements.map((e) => e.tag)).toEqual(["tree", "item", "item", "other"]);
    expect(doc?.find("item")).toEqual({ name: "a" });
  });

  it("returns null from find for an absent tag", () => {
    const doc = parseStatusDocument('<item name="a"/>');
    expect(doc?.find("tree")).toBeNull();
  });

  it("keeps attribute values as strings", () => {
    const doc = parseStatusDocument('<tree count="007" flag="true"/>');
    expect(doc?.find("tree")).toEqual({ count: "007", flag: "true" });
  });
});

describe("findFailureMarker", () => {
  it("returns the desc of an element reporting an error", () => {
    const doc = parseStatusDocument(
      '<tree message="ERROR" desc="Invalid username or Password"/>',
    );
    expect(findFailureMarker(doc)).toBe("Invalid username or Password");
  });

  it("falls back to the message when desc is absent", () => {
    const doc = parseStatusDocument('<item message="failure"/>');
    expect(findFailureMarker(doc)).toBe("failure");
  });

  it("returns null for a successful reply or no document", () => {
    expect(findFailureMarker(parseStatusDocument(VALIDATE_REPLY))).toBeNull();
    expect(findFailureMarker(null)).toBeNull();
  });
});

import { describe, it, expect } from "vitest";
import { FragmentReassembler, reassemble } from "../src/reassembler";

describe("reassembler fragments", () => {
  it("holds a record split across markers, digits and content", () => {
    const r = new FragmentReassembler();
    expect(r.push("<1").records).toEqual([]);
    expect(r.pending).toBe("<1");
    expect(r.push("0>he").records).toEqual([]);
    expect(r.push("llo </1").records).toEqual([]);
    expect(r.pending).toBe("<10>hello </1");
    expect(r.push("0>").records).toEqual([{ position: 10, content: "hello " }]);
    expect(r.pending).toBe("");
  });

  it("returns several records from one chunk in order", () => {
    const r = new FragmentReassembler();
    expect(r.push("<10>a </10><20>b </20><30></30>").records).toEqual([
      { position: 10, content: "a " },
      { position: 20, content: "b " },
      { position: 30, content: "" }
    ]);
  });

  it("rejoins a UTF-8 sequence split between byte chunks", () => {
    const bytes = new TextEncoder().encode("<10>né</10>");
    const cut = bytes.indexOf(0xc3) + 1;
    const r = new FragmentReassembler();
    expect(r.push(bytes.subarray(0, cut)).records).toEqual([]);
    expect(r.push(bytes.subarray(cut)).records).toEqual([{ position: 10, content: "né" }]);
  });

  it("keeps held bytes ahead of a following string chunk", () => {
    const r = new FragmentReassembler();
    expect(r.push(new TextEncoder().encode("<10>a")).records).toEqual([]);
    expect(r.push("b</10>").records).toEqual([{ position: 10, content: "ab" }]);

    const cut = new FragmentReassembler();
    cut.push(new Uint8Array([0x3c, 0x31, 0x30, 0x3e, 0xc3]));
    expect(cut.push("</10>").records).toEqual([{ position: 10, content: "\ufffd" }]);
  });

  it("decodes entities unless told not to", () => {
    expect(new FragmentReassembler().push("<10>AT&amp;T &#233;</10>").records).toEqual([
      { position: 10, content: "AT&T é" }
    ]);
    expect(new FragmentReassembler().push("<10>caf&eacute;&nbsp;</10>").records).toEqual([
      { position: 10, content: "café\u00a0" }
    ]);
    expect(new FragmentReassembler({ decodeEntities: false }).push("<10>AT&amp;T</10>").records).toEqual([
      { position: 10, content: "AT&amp;T" }
    ]);
  });

  it("keeps a literal less-than sign inside content", () => {
    const r = new FragmentReassembler();
    expect(r.push("<10>a < b</10><20>x<y<></20>").records).toEqual([
      { position: 10, content: "a < b" },
      { position: 20, content: "x<y<>" }
    ]);
  });

  it("drops envelope tags silently", () => {
    const r = new FragmentReassembler({ noise: "report" });
    expect(r.push("<x><reset/><update><10>hi</10></update></x>")).toEqual({
      records: [{ position: 10, content: "hi" }],
      issues: []
    });
  });

  it("reports noise only when asked to", () => {
    expect(new FragmentReassembler().push("junk<10>a</10>").issues).toEqual([]);
    expect(new FragmentReassembler({ noise: "report" }).push("junk<10>a</10>\n").issues).toEqual([
      { kind: "ProtocolNoise", text: "junk\n" }
    ]);
    expect(new FragmentReassembler({ noise: "report" }).push("<10>a</10>\n  ").issues).toEqual([]);
  });

  it("abandons a record when another opens before it closes", () => {
    const r = new FragmentReassembler();
    expect(r.push("<10>foo<20>bar</20>")).toEqual({
      records: [{ position: 20, content: "bar" }],
      issues: [{ kind: "MalformedMarker", reason: "open_before_close", id: 10 }]
    });
  });

  it("turns a mismatched record into a blank under the blank policy", () => {
    const r = new FragmentReassembler({ mismatch: "blank" });
    expect(r.push("<100>the </110>")).toEqual({
      records: [{ position: 100, content: "" }],
      issues: [{ kind: "MalformedMarker", reason: "mismatched_close", id: 100, closeId: 110 }]
    });
  });

  it("reports an unterminated record at the end", () => {
    const r = new FragmentReassembler();
    expect(r.push("<10>half").records).toEqual([]);
    expect(r.finish()).toEqual({
      records: [],
      issues: [{ kind: "MalformedMarker", reason: "unterminated", id: 10 }]
    });
    expect(r.finish()).toEqual({ records: [], issues: [] });

    const blank = new FragmentReassembler({ mismatch: "blank" });
    blank.push("<10>half");
    expect(blank.finish().records).toEqual([{ position: 10, content: "" }]);
  });

  it("gives up on an overlong marker and recovers", () => {
    const r = new FragmentReassembler({ maxMarkerLength: 8 });
    expect(r.push("<123456789>")).toEqual({
      records: [],
      issues: [{ kind: "MalformedMarker", reason: "marker_too_long" }]
    });
    expect(r.push("<10>ok</10>").records).toEqual([{ position: 10, content: "ok" }]);
  });

  it("forgets partial input on reset", () => {
    const r = new FragmentReassembler();
    r.push("<10>dangling");
    r.reset();
    expect(r.pending).toBe("");
    expect(r.push("</10>").issues).toEqual([{ kind: "MalformedMarker", reason: "stray_close", closeId: 10 }]);
  });

  it("yields records lazily from a chunk sequence", () => {
    const records = reassemble(["<10>a</10><2", "0>b</2", "0>"]);
    expect(records.next().value).toEqual({ position: 10, content: "a" });
    expect([...records]).toEqual([{ position: 20, content: "b" }]);
  });
});

import { test } from "tap";
import {
  BIO,
  BILOU,
  BMEWO,
  IOB,
  IOBES,
  defineScheme,
  renderMarker,
  roleOf,
  type EncodingScheme,
  type Position,
} from "../src/scheme/scheme.js";
import { SchemeRegistry, UnknownSchemeError, getScheme } from "../src/scheme/registry.js";
import { parseSpans } from "../src/parser/parse.js";
import { encode } from "../src/encode/encode.js";
import { createSpan, sortSpans, spanLength } from "../src/span/span.js";

test("getScheme resolves names and aliases", (t) => {
  t.equal(getScheme("IOB"), IOB);
  t.equal(getScheme("iob1"), IOB);
  t.equal(getScheme("bio"), BIO);
  t.equal(getScheme(" IOB2 "), BIO);
  t.equal(getScheme("iobes"), IOBES);
  t.equal(getScheme("Bilou"), BILOU);
  t.equal(getScheme("bmewo"), BMEWO);
  t.equal(getScheme("bmeow"), BMEWO);
  t.end();
});

test("getScheme passes descriptors through", (t) => {
  t.equal(getScheme(IOBES), IOBES);
  t.end();
});

test("getScheme rejects unknown names", (t) => {
  t.throws(() => getScheme("token"), { name: "UnknownSchemeError", scheme: "token" });
  t.throws(() => getScheme(""), UnknownSchemeError);
  t.end();
});

test("SchemeRegistry lists canonical names once", (t) => {
  const registry = new SchemeRegistry();
  t.strictSame(registry.names(), ["IOB", "BIO", "IOBES", "BILOU", "BMEWO"]);
  t.end();
});

test("SchemeRegistry starts empty when given no schemes", (t) => {
  const registry = new SchemeRegistry([]);
  t.notOk(registry.has("BIO"));
  t.equal(registry.get("BIO"), undefined);
  t.throws(() => registry.resolve("BIO"), UnknownSchemeError);
  t.end();
});

test("a registered custom scheme parses and encodes", (t) => {
  const bmlu = defineScheme({
    name: "BMLU",
    aliases: ["begin-middle-last-unit"],
    family: "explicit",
    begin: "B",
    inside: "M",
    end: "L",
    single: "U",
  });
  const registry = new SchemeRegistry();
  registry.register(bmlu);

  t.equal(registry.resolve("Begin-Middle-Last-Unit"), bmlu);

  const spans = parseSpans(["B-X", "M-X", "L-X", "U-Y"], bmlu);
  t.strictSame(spans, [
    { type: "X", start: 0, end: 3, tokens: [0, 1, 2] },
    { type: "Y", start: 3, end: 4, tokens: [3] },
  ]);
  t.strictSame(encode(spans, 5, bmlu), ["B-X", "M-X", "L-X", "U-Y", "O"]);
  t.end();
});

test("defineScheme fills lookahead defaults", (t) => {
  t.equal(BIO.end, "I");
  t.equal(BIO.single, "B");
  t.equal(IOB.single, "B");
  t.ok(IOB.boundaryBegin);
  t.notOk(BIO.boundaryBegin);
  t.ok(Object.isFrozen(BIO));
  t.end();
});

test("defineScheme rejects incomplete or ambiguous tables", (t) => {
  t.throws(
    () => defineScheme({ name: "half", family: "explicit", begin: "B", inside: "I" }),
    TypeError
  );
  t.throws(
    () => defineScheme({ name: "same", family: "lookahead", begin: "I", inside: "I" }),
    TypeError
  );
  t.throws(
    () =>
      defineScheme({
        name: "dup",
        family: "explicit",
        begin: "B",
        inside: "I",
        end: "E",
        single: "B",
      }),
    TypeError
  );
  t.end();
});

test("roleOf reads roles per scheme", (t) => {
  t.equal(roleOf({ marker: "O" }, BIO), "outside");
  t.equal(roleOf({ marker: "B", type: "X" }, BIO), "begin");
  t.equal(roleOf({ marker: "I", type: "X" }, BIO), "inside");
  t.equal(roleOf({ marker: "B", type: "X" }, IOB), "begin");
  t.equal(roleOf({ marker: "E", type: "X" }, IOBES), "end");
  t.equal(roleOf({ marker: "S", type: "X" }, IOBES), "single");
  t.equal(roleOf({ marker: "L", type: "X" }, BILOU), "end");
  t.equal(roleOf({ marker: "U", type: "X" }, BILOU), "single");
  t.equal(roleOf({ marker: "M", type: "X" }, BMEWO), "inside");
  t.equal(roleOf({ marker: "W", type: "X" }, BMEWO), "single");
  t.end();
});

test("renderMarker follows each scheme's table", (t) => {
  const positions: Position[] = ["first", "middle", "last", "only"];
  const render = (scheme: EncodingScheme): string[] =>
    positions.map((position) => renderMarker(scheme, position));

  t.strictSame(render(BIO), ["B", "I", "I", "B"]);
  t.strictSame(render(IOBES), ["B", "I", "E", "S"]);
  t.strictSame(render(BILOU), ["B", "I", "L", "U"]);
  t.strictSame(render(BMEWO), ["B", "M", "E", "W"]);
  t.strictSame(render(IOB), ["I", "I", "I", "I"]);
  t.end();
});

test("renderMarker uses B in IOB only after an adjacent span of the same type", (t) => {
  t.equal(renderMarker(IOB, "first", true), "B");
  t.equal(renderMarker(IOB, "only", true), "B");
  t.equal(renderMarker(IOB, "middle", true), "I");
  t.equal(renderMarker(BIO, "first", true), "B");
  t.equal(renderMarker(IOBES, "only", true), "S");
  t.end();
});

test("createSpan builds frozen spans", (t) => {
  const span = createSpan("PER", 2, 5);
  t.strictSame(span, { type: "PER", start: 2, end: 5, tokens: [2, 3, 4] });
  t.ok(Object.isFrozen(span));
  t.ok(Object.isFrozen(span.tokens));
  t.equal(spanLength(span), 3);
  t.end();
});

test("sortSpans orders by start, then end", (t) => {
  const a = createSpan("A", 4, 5);
  const b = createSpan("B", 0, 2);
  const c = createSpan("C", 0, 1);
  const input = [a, b, c];
  t.strictSame(sortSpans(input), [c, b, a]);
  t.strictSame(input, [a, b, c], "input is not reordered");
  t.end();
});

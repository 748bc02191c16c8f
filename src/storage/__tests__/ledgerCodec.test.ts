import { describe, it, expect } from "vitest";
import {
  decodeLedger,
  decodeLedgerBytes,
  decodeRecord,
  encodeRecord,
  escapeField,
  LedgerDecodeError,
  unescapeField,
} from "../ledgerCodec";

describe("ledgerCodec", () => {
  describe("encodeRecord", () => {
    it("joins plain fields with '<' and ends the line", () => {
      expect(
        encodeRecord({ fileName: "x.png", fullImageURL: "http://full", thumbImageURL: "http://thumb" })
      ).toBe("x.png<http://full<http://thumb\n");
    });

    it("escapes separator, percent and line breaks inside fields", () => {
      expect(
        encodeRecord({ fileName: "a<b%c.jpg", fullImageURL: "u1\n", thumbImageURL: "u2\r" })
      ).toBe("a%3Cb%25c.jpg<u1%0A<u2%0D\n");
    });
  });

  describe("decodeRecord", () => {
    it("reads the three fields", () => {
      expect(decodeRecord("fileName<URLfull<URLthumb")).toEqual({
        fileName: "fileName",
        fullImageURL: "URLfull",
        thumbImageURL: "URLthumb",
      });
    });

    it("restores escaped characters", () => {
      expect(decodeRecord("a%3Cb%25c.jpg<u1%0a<u2%0D").fileName).toBe("a<b%c.jpg");
      expect(decodeRecord("a%3Cb%25c.jpg<u1%0a<u2%0D").fullImageURL).toBe("u1\n");
    });

    it("strips a trailing carriage return", () => {
      expect(decodeRecord("f.jpg<u1<u2\r").thumbImageURL).toBe("u2");
    });

    it("rejects a line with fewer than 3 fields", () => {
      expect(() => decodeRecord("noooooooooooo")).toThrow(LedgerDecodeError);
      expect(() => decodeRecord("a<b")).toThrow("expected 3 fields, found 2");
    });

    it("rejects a line with more than 3 fields", () => {
      expect(() => decodeRecord("a<b<c<d")).toThrow("expected 3 fields, found 4");
    });

    it("rejects an unknown escape", () => {
      expect(() => unescapeField("100%.jpg")).toThrow('invalid escape "%.j"');
      expect(() => unescapeField("end%")).toThrow('invalid escape "%"');
    });
  });

  it("round-trips a field containing every escaped character", () => {
    const raw = "we<ird%\r\nname.png";
    expect(unescapeField(escapeField(raw))).toBe(raw);
  });

  describe("decodeLedger", () => {
    it("treats empty content as an empty ledger", () => {
      expect(decodeLedger("")).toEqual({ entries: [] });
    });

    it("rejects a last record without a line break as torn", () => {
      expect(decodeLedger("a.jpg<f1<t1\nb.jpg<http://full<http://th")).toEqual({
        failure: { lineNumber: 2, reason: "unterminated record" },
      });
      expect(decodeLedger("a.jpg<fa<ta")).toEqual({
        failure: { lineNumber: 1, reason: "unterminated record" },
      });
    });

    it("decodes terminated records", () => {
      expect(decodeLedger("a.jpg<f1<t1\nb.jpg<f2<t2\n")).toEqual({
        entries: [
          { fileName: "a.jpg", fullImageURL: "f1", thumbImageURL: "t1" },
          { fileName: "b.jpg", fullImageURL: "f2", thumbImageURL: "t2" },
        ],
      });
    });

    it("reports the first bad line number", () => {
      expect(decodeLedger("a.jpg<f1<t1\nb.jpg<f2\n")).toEqual({
        failure: { lineNumber: 2, reason: "expected 3 fields, found 2" },
      });
    });

    it("treats an empty line in the middle as corruption", () => {
      expect(decodeLedger("a.jpg<f1<t1\n\nb.jpg<f2<t2\n")).toEqual({
        failure: { lineNumber: 2, reason: "expected 3 fields, found 1" },
      });
    });
  });

  describe("decodeLedgerBytes", () => {
    it("decodes valid UTF-8", () => {
      expect(decodeLedgerBytes(Buffer.from("caf\u00e9.jpg<f<t\n", "utf-8"))).toEqual({
        entries: [{ fileName: "caf\u00e9.jpg", fullImageURL: "f", thumbImageURL: "t" }],
      });
    });

    it("reports the line holding invalid UTF-8", () => {
      const bytes = Buffer.concat([
        Buffer.from("a.jpg<f1<t1\nb", "utf-8"),
        Buffer.from([0xff, 0xfe]),
        Buffer.from(".jpg<f2<t2\n", "utf-8"),
      ]);
      expect(decodeLedgerBytes(bytes)).toEqual({ failure: { lineNumber: 2, reason: "invalid UTF-8" } });
    });
  });
});

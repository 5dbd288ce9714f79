import { describe, it, expect, vi } from "vitest";
import {
  DuplicateLessonFilenameError,
  DuplicateLessonUrlError,
  LessonUrlError,
} from "../src/errors.ts";
import { Logger } from "../src/logger.ts";
import {
  DEFAULT_LESSON_BASE_URL,
  buildLessonUrlMap,
  createLessonUrlPatterns,
  extractLessonUrl,
  normalizeLessonUrl,
  type LessonFile,
} from "../src/lessonUrl.ts";

const patterns = createLessonUrlPatterns("https://site.test/lesson/");

function lessonFile(filename: string, sourceUrl: string, dir = "/lessons"): LessonFile {
  return { path: `${dir}/${filename}`, filename, content: "", sourceUrl };
}

describe("lessonUrl", () => {
  describe("normalizeLessonUrl", () => {
    it("should map trailing slash, fragment and bare forms to one key", () => {
      const bare = normalizeLessonUrl("https://site.test/lesson/a");

      expect(normalizeLessonUrl("https://site.test/lesson/a/")).toBe(bare);
      expect(normalizeLessonUrl("https://site.test/lesson/a#x")).toBe(bare);
      expect(normalizeLessonUrl("  https://site.test/lesson/a  ")).toBe(bare);
    });

    it("should drop the fragment before the trailing slash", () => {
      expect(normalizeLessonUrl("https://site.test/lesson/a/#x")).toBe(
        "https://site.test/lesson/a",
      );
    });

    it("should strip only one trailing slash", () => {
      expect(normalizeLessonUrl("https://site.test/lesson/a//")).toBe(
        "https://site.test/lesson/a/",
      );
    });
  });

  describe("createLessonUrlPatterns", () => {
    it("should default to the lesson site", () => {
      expect(createLessonUrlPatterns().baseUrl).toBe(DEFAULT_LESSON_BASE_URL);
    });

    it("should accept either scheme in hyperlinks", () => {
      const links = 'href="http://site.test/lesson/a" href="https://site.test/lesson/b#c"';
      const matches = [...links.matchAll(patterns.href)].map((m) => [m[1], m[2]]);

      expect(matches).toEqual([
        ["http://site.test/lesson/a", ""],
        ["https://site.test/lesson/b", "#c"],
      ]);
    });

    it("should not match other sites", () => {
      expect('href="https://other.test/lesson/a"'.match(patterns.href)).toBeNull();
    });
  });

  describe("extractLessonUrl", () => {
    it("should read and normalize the saved-from marker", () => {
      const html = "<!DOCTYPE html>\n<!-- saved from url=(0031)https://site.test/lesson/a/ -->\n<html>";

      expect(extractLessonUrl(html, "a.html", patterns)).toBe("https://site.test/lesson/a");
    });

    it("should fail with the file name when the marker is missing", () => {
      expect(() => extractLessonUrl("<html></html>", "broken.html", patterns)).toThrow(
        LessonUrlError,
      );
      expect(() => extractLessonUrl("<html></html>", "broken.html", patterns)).toThrow(
        /broken\.html/,
      );
    });
  });

  describe("buildLessonUrlMap", () => {
    it("should map each URL to its filename", () => {
      const map = buildLessonUrlMap([
        lessonFile("a.html", "https://site.test/lesson/a"),
        lessonFile("b.html", "https://site.test/lesson/b"),
      ]);

      expect(map.get("https://site.test/lesson/a")).toBe("a.html");
      expect(map.get("https://site.test/lesson/b")).toBe("b.html");
      expect(map.size).toBe(2);
    });

    it("should reject two files claiming one URL", () => {
      const files = [
        lessonFile("a.html", "https://site.test/lesson/a"),
        lessonFile("a-copy.html", "https://site.test/lesson/a"),
      ];

      expect(() => buildLessonUrlMap(files)).toThrow(DuplicateLessonUrlError);
      expect(() => buildLessonUrlMap(files)).toThrow(
        "Duplicate lesson URL mapping for https://site.test/lesson/a: /lessons/a.html vs /lessons/a-copy.html",
      );
    });

    it("should reject one URL saved under the same filename in two directories", () => {
      const files = [
        lessonFile("x.html", "https://site.test/lesson/a", "/one"),
        lessonFile("x.html", "https://site.test/lesson/a", "/two"),
      ];

      expect(() => buildLessonUrlMap(files)).toThrow(
        "Duplicate lesson URL mapping for https://site.test/lesson/a: /one/x.html vs /two/x.html",
      );
    });

    it("should reject different lessons sharing a filename", () => {
      const files = [
        lessonFile("x.html", "https://site.test/lesson/a", "/one"),
        lessonFile("x.html", "https://site.test/lesson/b", "/two"),
      ];

      expect(() => buildLessonUrlMap(files)).toThrow(DuplicateLessonFilenameError);
      expect(() => buildLessonUrlMap(files)).toThrow(
        "Duplicate lesson filename x.html: /one/x.html vs /two/x.html",
      );
    });

    it("should log through the given logger", () => {
      const log = new Logger({ silent: true });
      const debug = vi.spyOn(log, "debug");

      buildLessonUrlMap([lessonFile("a.html", "https://site.test/lesson/a")], log);

      expect(debug).toHaveBeenCalledWith("Mapped 1 lesson URLs", {
        operation: "buildLessonUrlMap",
        count: 1,
      });
    });
  });
});

import { describe, it, expect } from "vitest";
import { UI_STRING_RULES, translateUiStrings } from "../src/uiTranslator.ts";

describe("uiTranslator", () => {
  it("should translate the skip link and lesson navigation labels", () => {
    const html =
      '<a href="#main"> Skip to main content </a>' +
      '<a aria-label="Previous lesson"></a><a aria-label="Next lesson"></a>';

    expect(translateUiStrings(html)).toEqual({
      html:
        '<a href="#main">Ga naar hoofdinhoud</a>' +
        '<a aria-label="Vorige les"></a><a aria-label="Volgende les"></a>',
      count: 3,
    });
  });

  it("should translate the bottom captions and autoplay label", () => {
    const html =
      '<div class="text-xs text-gray-400 mb-1">Previous</div>' +
      '<div class="text-xs text-gray-400 mb-1"> Next </div>' +
      '<span class="text-sm text-gray-300">Autoplay</span>';

    expect(translateUiStrings(html)).toEqual({
      html:
        '<div class="text-xs text-gray-400 mb-1">Vorige</div>' +
        '<div class="text-xs text-gray-400 mb-1">Volgende</div>' +
        '<span class="text-sm text-gray-300">Automatisch afspelen</span>',
      count: 3,
    });
  });

  it("should translate the lessons-list toggle in all three forms", () => {
    const html =
      "x-text=\"open ? 'Hide Lessons List' : 'Show Lessons List'\" " +
      "x-text=\"open ? &#39;Hide Lessons List&#39; : &#39;Show Lessons List&#39;\" " +
      "<span>Show Lessons List</span>";

    const result = translateUiStrings(html);

    expect(result.html).toBe(
      "x-text=\"open ? 'Verberg lessenlijst' : 'Toon lessenlijst'\" " +
        "x-text=\"open ? &#39;Verberg lessenlijst&#39; : &#39;Toon lessenlijst&#39;\" " +
        "<span>Toon lessenlijst</span>",
    );
    expect(result.count).toBe(5);
  });

  it("should translate scroll and clipboard labels", () => {
    const html =
      '<button aria-label="Scroll to top"></button>' +
      '<button aria-label="Copy to Clipboard" title="Copy to Clipboard"></button>';

    expect(translateUiStrings(html)).toEqual({
      html:
        '<button aria-label="Naar boven"></button>' +
        '<button aria-label="Kopieer naar klembord" title="Kopieer naar klembord"></button>',
      count: 3,
    });
  });

  it("should translate the lesson counter", () => {
    expect(translateUiStrings("<span>Lesson 03/12</span>")).toEqual({
      html: "<span>Les 03/12</span>",
      count: 1,
    });
  });

  describe("reading time", () => {
    it("should translate the sidebar badge", () => {
      const html = '<span class="text-xs text-gray-400 flex-shrink-0"> 7 min read </span>';

      expect(translateUiStrings(html)).toEqual({
        html: '<span class="text-xs text-gray-400 flex-shrink-0">7 min leestijd</span>',
        count: 1,
      });
    });

    it("should translate minute-only phrases", () => {
      expect(translateUiStrings("<p>12 min read</p>")).toEqual({
        html: "<p>12 min leestijd</p>",
        count: 1,
      });
    });

    it("should converge hour phrases in one pass", () => {
      expect(translateUiStrings("<p>1 h 56 min read</p>").html).toBe(
        "<p>1 u 56 min leestijd</p>",
      );
      expect(translateUiStrings("<p>1 h 56 min leestijd</p>")).toEqual({
        html: "<p>1 u 56 min leestijd</p>",
        count: 1,
      });
    });

    it("should count an hour phrase once", () => {
      expect(translateUiStrings("<p>2 h 5 min read</p>").count).toBe(1);
    });
  });

  it("should be a no-op on translated output", () => {
    const html =
      '<a> Skip to main content </a><span>Lesson 01/02</span><p>1 h 56 min read</p>' +
      "<span>Hide Lessons List</span>";
    const once = translateUiStrings(html).html;

    expect(translateUiStrings(once)).toEqual({ html: once, count: 0 });
  });

  it("should leave lesson prose alone", () => {
    const html = "<p>Read the next lesson to continue.</p>";
    expect(translateUiStrings(html)).toEqual({ html, count: 0 });
  });

  it("should give every rule a unique id", () => {
    const ids = UI_STRING_RULES.map((rule) => rule.id);
    expect(new Set(ids).size).toBe(ids.length);
  });
});

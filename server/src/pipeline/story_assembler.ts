import { AssemblyError } from "../errors.js";
import { CLIENT_NAVIGATION_FUNCTIONS } from "../navigation.js";
import type { Slide } from "./schemas.js";

export type AssembleOptions = {
  /** 0 turns auto-advance off. */
  autoAdvanceMs?: number;
};

export const DEFAULT_AUTO_ADVANCE_MS = 5000;

const ALLOWED_IMAGE_URL = /^(?:https?:\/\/|data:image\/)/i;

export function escapeHtml(input: string): string {
  return input
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}

/** Percent-encodes the characters that could end a CSS url("…") token. */
function cssUrlValue(url: string): string {
  return url.replace(/["'()\\\s]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`);
}

const STYLES = `
body, html { margin: 0; padding: 0; height: 100%; overflow: hidden; background: #000; }
.webstory-container { height: 100vh; position: relative; max-width: 56.25vh; margin: 0 auto; }
.webstory-slide { height: 100%; width: 100%; position: absolute; top: 0; left: 0; display: none; flex-direction: column; justify-content: flex-end; background-size: cover; background-position: center; }
.webstory-slide.active { display: flex; }
.webstory-slide--title { justify-content: center; }
.webstory-text { padding: 20px; background: rgba(0, 0, 0, 0.7); color: #fff; font-family: Arial, sans-serif; }
.webstory-text h1 { font-size: 1.8rem; margin: 0; }
.webstory-text h2 { font-size: 1.2rem; margin: 0; }
.webstory-nav { position: absolute; top: 0; height: 100%; width: 50%; z-index: 10; border: 0; background: transparent; cursor: pointer; }
.webstory-nav.prev { left: 0; }
.webstory-nav.next { right: 0; }
.progress-bar { position: absolute; top: 0; left: 0; right: 0; height: 4px; display: flex; z-index: 20; }
.progress-segment { height: 100%; flex: 1; margin: 0 2px; background: rgba(255, 255, 255, 0.3); }
.progress-segment.active { background: #fff; }
`.trim();

function checkSlides(slides: readonly Slide[]): void {
  if (slides.length === 0) throw new AssemblyError("cannot assemble a story without slides");
  if (slides[0].kind !== "title") throw new AssemblyError("the first slide must be the title slide");
  slides.forEach((slide, position) => {
    if (slide.index !== position) {
      throw new AssemblyError(`slide at position ${position} has index ${slide.index}`);
    }
    if (position > 0 && slide.kind !== "body") {
      throw new AssemblyError(`slide ${position} must be a body slide`);
    }
    if (!slide.imageUrl || !ALLOWED_IMAGE_URL.test(slide.imageUrl)) {
      throw new AssemblyError(`slide ${position} has no usable image url`);
    }
  });
}

function renderSlide(slide: Slide): string {
  const active = slide.index === 0 ? " active" : "";
  const style = escapeHtml(`background-image: url("${cssUrlValue(slide.imageUrl ?? "")}");`);
  const heading = slide.kind === "title" ? "h1" : "h2";
  return [
    `<section class="webstory-slide webstory-slide--${slide.kind}${active}" data-slide-index="${slide.index}" data-slide-kind="${slide.kind}" style="${style}">`,
    `<div class="webstory-text"><${heading}>${escapeHtml(slide.sourceText)}</${heading}></div>`,
    `</section>`
  ].join("\n");
}

function renderScript(autoAdvanceMs: number): string {
  return `
(function () {
${CLIENT_NAVIGATION_FUNCTIONS}
  var slides = document.querySelectorAll("[data-slide-index]");
  var segments = document.querySelectorAll("[data-progress-index]");
  var totalSlides = slides.length;
  var currentSlide = 0;
  var autoAdvanceMs = ${autoAdvanceMs};

  function showSlide(index) {
    for (var i = 0; i < totalSlides; i++) {
      slides[i].classList.toggle("active", i === index);
      segments[i].classList.toggle("active", i === index);
    }
    currentSlide = index;
  }

  function nextSlide() {
    showSlide(nextSlideIndex(currentSlide, totalSlides));
  }

  function prevSlide() {
    showSlide(prevSlideIndex(currentSlide, totalSlides));
  }

  document.querySelector(".webstory-nav.prev").addEventListener("click", prevSlide);
  document.querySelector(".webstory-nav.next").addEventListener("click", nextSlide);
  document.addEventListener("keydown", function (event) {
    if (event.key === "ArrowRight") nextSlide();
    else if (event.key === "ArrowLeft") prevSlide();
  });

  if (autoAdvanceMs > 0 && totalSlides > 1) setInterval(nextSlide, autoAdvanceMs);
})();
`.trim();
}

/**
 * Renders the self-contained webstory document. Slide 0 is the title card; the rest are
 * content cards in the given order.
 */
export function assembleStory(title: string, slides: readonly Slide[], options: AssembleOptions = {}): string {
  checkSlides(slides);
  const autoAdvanceMs = options.autoAdvanceMs ?? DEFAULT_AUTO_ADVANCE_MS;
  if (!Number.isInteger(autoAdvanceMs) || autoAdvanceMs < 0) {
    throw new AssemblyError(`autoAdvanceMs must be a non-negative integer, got ${autoAdvanceMs}`);
  }

  const segments = slides
    .map((slide) => `<div class="progress-segment${slide.index === 0 ? " active" : ""}" data-progress-index="${slide.index}"></div>`)
    .join("\n");

  return [
    "<!DOCTYPE html>",
    `<html lang="en">`,
    "<head>",
    `<meta charset="UTF-8">`,
    `<meta name="viewport" content="width=device-width, initial-scale=1.0">`,
    `<title>${escapeHtml(title)} - Webstory</title>`,
    `<style>\n${STYLES}\n</style>`,
    "</head>",
    "<body>",
    `<main class="webstory-container" data-slide-count="${slides.length}">`,
    `<div class="progress-bar">\n${segments}\n</div>`,
    ...slides.map(renderSlide),
    `<button class="webstory-nav prev" type="button" aria-label="Previous slide"></button>`,
    `<button class="webstory-nav next" type="button" aria-label="Next slide"></button>`,
    "</main>",
    `<script>\n${renderScript(autoAdvanceMs)}\n</script>`,
    "</body>",
    "</html>",
    ""
  ].join("\n");
}

import type { PreferenceMap, ProcessedDataSet, SlideLayout } from "../../types/view";

export const normalizeSlideNumber = (slideNumber: number): number =>
  Number.isFinite(slideNumber) && slideNumber >= 1 ? Math.floor(slideNumber) : 1;

// Sets are bucketed in name order so the layout does not depend on map insertion order.
export const organizeSlides = (preferences: PreferenceMap): SlideLayout => {
  const slides = new Map<number, string[]>();
  let totalSlides = 1;

  Object.keys(preferences)
    .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
    .forEach((name) => {
      const preference = preferences[name];
      if (preference.viewKind === "skip") {
        return;
      }
      const slide = normalizeSlideNumber(preference.slideNumber);
      const bucket = slides.get(slide) ?? [];
      bucket.push(name);
      slides.set(slide, bucket);
      totalSlides = Math.max(totalSlides, slide);
    });

  return { slides, totalSlides };
};

export const clampSlide = (currentSlide: number, totalSlides: number): number =>
  currentSlide < 1 || currentSlide > totalSlides ? 1 : currentSlide;

export const setsForSlide = (
  layout: SlideLayout,
  slide: number,
  processed: readonly ProcessedDataSet[]
): ProcessedDataSet[] => {
  const names = layout.slides.get(slide) ?? [];
  return names.flatMap((name) => processed.filter((data) => data.setName === name));
};

import type { MarkerSet } from "../../../core/output/extract";

const abortingMarker = "error: aborting";
const runningMarker = "Running `/playground";

export const miriMarkers: MarkerSet = {
  start: [runningMarker],
  stop: [abortingMarker],
};

export const expandMarkers: MarkerSet = {
  start: ["Finished ", "Compiling playground"],
  stop: [abortingMarker],
};

export const clippyMarkers: MarkerSet = {
  start: ["Checking playground", runningMarker],
  stop: [abortingMarker, "1 warning emitted", "warnings emitted", "Finished "],
};

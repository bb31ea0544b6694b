import { recordKey, type CanonicalMovieRecord } from "./types";

// The selection is owned by the caller; these helpers never mutate it.

export function isSelected(
  selection: readonly CanonicalMovieRecord[],
  key: string,
): boolean {
  return selection.some((movie) => recordKey(movie) === key);
}

export function addToSelection(
  selection: readonly CanonicalMovieRecord[],
  movie: CanonicalMovieRecord,
): CanonicalMovieRecord[] {
  if (isSelected(selection, recordKey(movie))) return [...selection];
  return [...selection, movie];
}

export function removeFromSelection(
  selection: readonly CanonicalMovieRecord[],
  key: string,
): CanonicalMovieRecord[] {
  return selection.filter((movie) => recordKey(movie) !== key);
}

import { type Choice, type Size } from '../types/rectangle.js';

/**
 * Cartesian product of option lists, with the last list varying fastest.
 * An empty list of option lists yields a single empty combination.
 */
export function cartesianProduct<T>(options: readonly (readonly T[])[]): T[][] {
  let combos: T[][] = [[]];
  for (const opts of options) {
    const next: T[][] = [];
    for (const combo of combos) {
      for (const opt of opts) {
        next.push([...combo, opt]);
      }
    }
    combos = next;
  }
  return combos;
}

/**
 * Flattens a sequence of choices into a flat list of sizes, preserving order.
 */
export function flattenChoices(choices: readonly Choice[]): Size[] {
  const out: Size[] = [];
  for (const choice of choices) {
    switch (choice.kind) {
      case 'item':
        out.push(choice.size);
        break;
      case 'group':
        out.push(...choice.sizes);
        break;
    }
  }
  return out;
}

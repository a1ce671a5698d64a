/**
 * Maps every category to a palette entry by its position in sorted order,
 * wrapping around when there are more categories than colors.
 */
export const assignColors = <C>(
  categories: Iterable<string>,
  palette: readonly C[],
): Map<string, C> => {
  const sorted = Array.from(new Set(categories)).sort();
  const table = new Map<string, C>();
  if (palette.length === 0) {
    return table;
  }
  sorted.forEach((category, index) => {
    const color = palette[index % palette.length];
    if (color !== undefined) {
      table.set(category, color);
    }
  });
  return table;
};

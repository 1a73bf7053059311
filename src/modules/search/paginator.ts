/**
 * Slices one page out of an already filtered and sorted sequence
 */
export const paginate = <T>(items: readonly T[], page: number, pageSize: number): T[] => {
  const offset = (page - 1) * pageSize;
  return items.slice(offset, offset + pageSize);
};

export const totalPages = (totalCount: number, pageSize: number): number =>
  Math.ceil(totalCount / pageSize);

export interface RequestTracker {
  begin: () => number;
  isCurrent: (id: number) => boolean;
}

// Only the most recently started request may write its result.
export const createRequestTracker = (): RequestTracker => {
  let latest = 0;
  return {
    begin: () => {
      latest += 1;
      return latest;
    },
    isCurrent: (id) => id === latest
  };
};

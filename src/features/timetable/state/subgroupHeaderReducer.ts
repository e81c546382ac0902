import type { SubgroupCluster } from '@/types/schedule';

// Scan state for the subgroup-number header row.
// `current` is null while idle, or the numbers of the cluster being read.
export type State = {
  clusters: SubgroupCluster[];
  current: number[] | null;
  seen: number;           // header cells consumed so far
  done: boolean;
};

export type Action =
  | { type: 'EMPTY_CELL' }
  | { type: 'SUBGROUP_NUMBER'; value: number }
  | { type: 'END' };

export const initialState: State = {
  clusters: [],
  current: null,
  seen: 0,
  done: false,
};

export function reducer(state: State, action: Action): State {
  if (state.done) return state;
  switch (action.type) {
    case 'EMPTY_CELL': {
      // Closes whatever the previous column started; a leading empty cell closes nothing
      const clusters = state.seen === 0 ? state.clusters : [...state.clusters, state.current];
      return { ...state, clusters, current: null, seen: state.seen + 1 };
    }
    case 'SUBGROUP_NUMBER': {
      const { value } = action;
      if (state.current === null) {
        // Number right after a column without subgroups: that column was a group of its own
        const clusters = state.seen === 0 ? state.clusters : [...state.clusters, null];
        return { ...state, clusters, current: [value], seen: state.seen + 1 };
      }
      const last = state.current[state.current.length - 1];
      if (last !== undefined && value <= last) {
        // Numbering did not go up: an adjacent group starts without a separator
        return {
          ...state,
          clusters: [...state.clusters, state.current],
          current: [value],
          seen: state.seen + 1,
        };
      }
      return { ...state, current: [...state.current, value], seen: state.seen + 1 };
    }
    case 'END': {
      return { ...state, clusters: [...state.clusters, state.current], current: null, done: true };
    }
    default:
      return state;
  }
}

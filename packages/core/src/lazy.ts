import {StaticTypeCompanion} from "./companion.js";

export interface LazyOne<T> {
  readonly get: T
}

/** Deferred construction of a single value, computed on first read */
export const Lazy = StaticTypeCompanion({
  once<F>(fn: () => F): LazyOne<F> {
    let state: { done: false } | { done: true; value: F } = { done: false }
    return {
      get get() {
        if (!state.done) {
          state = { done: true, value: fn() }
        }
        return state.value
      },
    }
  },
})

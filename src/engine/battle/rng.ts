import type { RandomSource } from './types'

const RNG_A = 1664525
const RNG_C = 1013904223
const RNG_M = 0x100000000

export const mathRandom: RandomSource = () => Math.random()

/** Linear congruential source; the same seed always replays the same draws. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (Math.imul(state, RNG_A) + RNG_C) >>> 0
    return state / RNG_M
  }
}

import { CONFIG } from '@config/store'

export type PauseReason = 'between-actions' | 'end-of-turn'

/** Presentation hook between turn steps. Never changes what the turn resolves to. */
export interface Pacer {
  pause(reason: PauseReason): Promise<void>
}

export const immediatePacer: Pacer = {
  pause: () => Promise.resolve(),
}

export function timerPacer(): Pacer {
  return {
    pause(reason) {
      const { pacing } = CONFIG()
      const delay = reason === 'between-actions' ? pacing.ACTION_DELAY_MS : pacing.TURN_DELAY_MS
      if (delay <= 0) {
        return Promise.resolve()
      }
      return new Promise((resolve) => {
        setTimeout(resolve, delay)
      })
    },
  }
}

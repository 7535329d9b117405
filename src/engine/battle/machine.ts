import { executeAction } from './actions'
import { decideEnemyAction } from './ai'
import { createContext } from './context'
import { orderActions } from './order'
import { immediatePacer, type Pacer, type PauseReason } from './pacing'
import { recordEvent } from './state'
import { isSideDown, promoteActive } from './targeting'
import { isTerminal, type Action, type BattleContext, type BattleState, type Phase, type TurnResult } from './types'

/**
 * Walks one full turn. Yields a pause before every action after the first and
 * once more before handing the next turn back; the returned value is the same
 * whether or not anybody waits on those pauses.
 */
export function* turnSteps(
  state: BattleState,
  playerAction: Action,
  enemyAction: Action,
  ctx: BattleContext,
): Generator<PauseReason, TurnResult, void> {
  if (state.phase !== 'selecting') {
    ctx.logger.debug(`[battle] turn ignored in phase ${state.phase}`)
    return { state, events: [] }
  }

  let current: BattleState = { ...state, phase: 'resolving' }
  const events: string[] = []
  const ordered = orderActions(current, [playerAction, enemyAction])

  for (let i = 0; i < ordered.length; i += 1) {
    if (i > 0) {
      yield 'between-actions'
    }
    const step = executeAction(current, ordered[i], ctx)
    current = step.state
    if (step.event) {
      events.push(step.event)
    }
    if (isTerminal(current.phase)) {
      return { state: current, events }
    }
    const outcome = checkOutcome(current)
    if (outcome) {
      const event = outcome === 'victory' ? 'Victory!' : 'Defeat...'
      current = recordEvent({ ...current, phase: outcome }, event)
      events.push(event)
      return { state: current, events }
    }
  }

  yield 'end-of-turn'

  const promoted = promoteActive(current)
  current = promoted.state
  for (const event of promoted.events) {
    current = recordEvent(current, event)
    events.push(event)
  }
  return {
    state: { ...current, phase: 'selecting', turn: current.turn + 1, guards: [] },
    events,
  }
}

/** The player side is checked first, so mutual exhaustion is a defeat. */
export function checkOutcome(state: BattleState): Extract<Phase, 'victory' | 'defeat'> | undefined {
  if (isSideDown(state, 'player')) return 'defeat'
  if (isSideDown(state, 'enemy')) return 'victory'
  return undefined
}

export function resolveTurn(
  state: BattleState,
  playerAction: Action,
  enemyAction: Action,
  ctx: BattleContext = createContext(),
): TurnResult {
  const steps = turnSteps(state, playerAction, enemyAction, ctx)
  let next = steps.next()
  while (!next.done) {
    next = steps.next()
  }
  return next.value
}

export async function playTurn(
  state: BattleState,
  playerAction: Action,
  enemyAction: Action,
  ctx: BattleContext = createContext(),
  pacer: Pacer = immediatePacer,
): Promise<TurnResult> {
  const steps = turnSteps(state, playerAction, enemyAction, ctx)
  let next = steps.next()
  while (!next.done) {
    await pacer.pause(next.value)
    next = steps.next()
  }
  return next.value
}

export interface BattleMachineOptions {
  context?: Partial<BattleContext>
  pacer?: Pacer
}

/** Owns the authoritative state of one battle; callers only ever see snapshots. */
export class BattleMachine {
  private state: BattleState

  private readonly ctx: BattleContext

  private readonly pacer: Pacer

  private inFlight = false

  constructor(initial: BattleState, options: BattleMachineOptions = {}) {
    this.state = initial
    this.ctx = createContext(options.context)
    this.pacer = options.pacer ?? immediatePacer
  }

  snapshot(): BattleState {
    return this.state
  }

  get finished(): boolean {
    return isTerminal(this.state.phase)
  }

  async submit(playerAction: Action): Promise<TurnResult> {
    if (this.inFlight || this.state.phase !== 'selecting') {
      this.ctx.logger.debug(`[battle] submission ignored (phase ${this.state.phase}, busy ${this.inFlight})`)
      return { state: this.state, events: [] }
    }
    this.inFlight = true
    try {
      const enemyAction = decideEnemyAction(this.state, this.ctx)
      const result = await playTurn(this.state, playerAction, enemyAction, this.ctx, this.pacer)
      this.state = result.state
      return result
    } finally {
      this.inFlight = false
    }
  }
}

import { PreconditionError } from '../errors'

/**
 * Picks the next speaker at random, never the one who just spoke
 * unless nobody else is available.
 */
export class TurnScheduler {
  private previous: string | null = null
  private readonly random: () => number

  constructor(random: () => number = Math.random) {
    this.random = random
  }

  get lastSelected(): string | null {
    return this.previous
  }

  /**
   * @param previous - Speaker to avoid; defaults to this scheduler's last pick, `null` for none
   * @throws PreconditionError when `available` is empty
   */
  selectNext(available: readonly string[], previous: string | null = this.previous): string {
    if (available.length === 0) {
      throw new PreconditionError('Cannot select a speaker from an empty participant set')
    }

    const others = available.filter((name) => name !== previous)
    const candidates = others.length > 0 ? others : available
    const index = Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1)
    const next = candidates[index]
    if (next === undefined) {
      throw new PreconditionError(`Scheduler drew index ${index} from ${candidates.length} candidates`)
    }

    this.previous = next
    return next
  }

  reset(): void {
    this.previous = null
  }
}

import type { CorePet_TickContext } from '../../../TickContext'

/**
 * ASensor:
 * Base class for sensors that pull raw game state into the core.
 *
 * Responsibilities:
 * - Throttles sensor execution using updateRate (ms) based on ctx.time.
 * - tick(ctx) is called by the controller each tick.
 * - update(ctx) is implemented by concrete sensors.
 *
 * Notes:
 * - Sensors MUST use ctx.time, not Date.now().
 * - The first tick after construction or reset() always runs.
 */
export abstract class CorePet_ASensor {
    private lastUpdate = Number.NEGATIVE_INFINITY

    constructor(
        private readonly updateRate: number // milliseconds
    ) {}

    tick(ctx: CorePet_TickContext): void {
        const now = ctx.time

        if (now - this.lastUpdate < this.updateRate) {
            return
        }

        this.lastUpdate = now
        this.update(ctx)
    }

    protected abstract update(ctx: CorePet_TickContext): void

    reset(): void {
        this.lastUpdate = Number.NEGATIVE_INFINITY
    }
}

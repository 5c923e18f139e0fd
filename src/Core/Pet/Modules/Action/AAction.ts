import type { CorePet_TickContext } from '../../TickContext'
import type { CorePet_DebugLog } from '../Debug/DebugLog'

/**
 * When an action is allowed to act:
 * - 'always': every tick, usable or not
 * - 'usable': enable flag and user preference both on
 * - 'deployed': usable and the pet is on the map
 */
export type CorePet_ActionGate = 'always' | 'usable' | 'deployed'

/**
 * CorePet_AAction:
 * Base class for tick actions that turn arbitration into game commands.
 *
 * - The gate is checked before throttling, so an action that was gated
 *   off acts on the first tick it becomes eligible.
 * - intervalMs <= 0 means every eligible tick.
 * - Commands go through issue() so they show up in the debug trace.
 */
export abstract class CorePet_AAction {
    private lastRun: number = Number.NEGATIVE_INFINITY

    protected abstract readonly gate: CorePet_ActionGate

    constructor(
        private readonly debug: CorePet_DebugLog,
        protected intervalMs: number
    ) {}

    tick(ctx: CorePet_TickContext): void {
        if (!this.isOpen(ctx)) return

        const now = ctx.time
        if (this.intervalMs > 0 && now - this.lastRun < this.intervalMs) {
            return
        }

        this.lastRun = now
        this.update(ctx)
    }

    reset(): void {
        this.lastRun = Number.NEGATIVE_INFINITY
    }

    protected issue(label: string, command: () => void): void {
        this.debug.log(label)
        command()
    }

    protected abstract update(ctx: CorePet_TickContext): void

    private isOpen(ctx: CorePet_TickContext): boolean {
        switch (this.gate) {
            case 'always':
                return true
            case 'usable':
                return ctx.usable
            case 'deployed':
                return ctx.usable && ctx.game.isPetActive()
        }
    }
}

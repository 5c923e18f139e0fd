import { CorePet_ItemNotEquippedError } from '../../Errors/ItemNotEquippedError'
import { CorePet_DebugLog } from '../Debug/DebugLog'

/**
 * Requested gear state as seen by the arbitration layer.
 * 'default' means the user-configured gear applies.
 */
export type CorePet_GearRequest =
    | { readonly kind: 'override'; readonly gearId: number }
    | { readonly kind: 'default' }

export const CorePet_DEFAULT_GEAR_GRACE_MS = 5000

const DEFAULT_REQUEST: CorePet_GearRequest = Object.freeze({ kind: 'default' })

/**
 * CorePet_GearOverride:
 * Soft-state lease on the pet gear.
 *
 * - request(gearId) validates and (re)starts the lease.
 * - release() drops it immediately.
 * - Reads expire the lease lazily once more than gracePeriodMs
 *   has passed since the last request. There is no timer.
 *
 * Notes:
 * - A failed request leaves the previous lease untouched,
 *   including its timestamp.
 * - Time comes from the injected clock, never Date.now().
 */
export class CorePet_GearOverride {
    private active: CorePet_GearRequest = DEFAULT_REQUEST
    private lastRequestAt = 0
    private gracePeriodMs: number

    constructor(
        private readonly clock: () => number,
        private readonly isEquipped: (gearId: number) => boolean,
        private readonly debug: CorePet_DebugLog,
        gracePeriodMs: number = CorePet_DEFAULT_GEAR_GRACE_MS
    ) {
        this.gracePeriodMs = CorePet_GearOverride.checkGracePeriod(gracePeriodMs)
    }

    /* ------------------------------------------------------------
     * Lease
     * ------------------------------------------------------------ */

    /**
     * Request (or refresh) an override.
     * @throws CorePet_ItemNotEquippedError if the gear is not equipped
     */
    request(gearId: number): void {
        if (!this.isEquipped(gearId)) {
            throw new CorePet_ItemNotEquippedError(gearId)
        }

        const prev = this.current()
        if (prev.kind === 'default' || prev.gearId !== gearId) {
            this.debug.log(`gear override -> ${gearId}`)
        }

        this.active = Object.freeze({ kind: 'override', gearId })
        this.lastRequestAt = this.clock()
    }

    /** Explicit relinquish, back to the user default. */
    release(): void {
        if (this.active.kind === 'override') {
            this.debug.log(`gear override ${this.active.gearId} released`)
        }
        this.active = DEFAULT_REQUEST
    }

    /** Current request, after applying expiry. */
    current(): CorePet_GearRequest {
        this.expire()
        return this.active
    }

    /**
     * Ms left before the lease lapses, 0 when there is none.
     * The lease still holds while this reads 0 at the exact boundary;
     * it lapses on the first read after it.
     */
    getTimeRemaining(): number {
        this.expire()
        if (this.active.kind === 'default') return 0

        const rem = this.lastRequestAt + this.gracePeriodMs - this.clock()
        return rem > 0 ? rem : 0
    }

    /* ------------------------------------------------------------
     * Tunables
     * ------------------------------------------------------------ */

    getGracePeriod(): number {
        return this.gracePeriodMs
    }

    setGracePeriod(ms: number): void {
        this.gracePeriodMs = CorePet_GearOverride.checkGracePeriod(ms)
    }

    reset(): void {
        this.active = DEFAULT_REQUEST
        this.lastRequestAt = 0
    }

    private expire(): void {
        if (this.active.kind === 'default') return

        if (this.clock() - this.lastRequestAt > this.gracePeriodMs) {
            this.debug.log(`gear override ${this.active.gearId} expired`)
            this.active = DEFAULT_REQUEST
        }
    }

    static checkGracePeriod(ms: number): number {
        if (!Number.isFinite(ms) || ms <= 0) {
            throw new RangeError(`Gear grace period must be a positive number of ms, got ${ms}`)
        }
        return ms
    }
}

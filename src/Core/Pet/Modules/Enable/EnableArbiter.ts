import { CorePet_DebugLog } from '../Debug/DebugLog'

/**
 * CorePet_EnableArbiter
 *
 * Shared enable flag for the running session.
 *
 * Notes:
 * - Last writer wins. There is no notion of which module wrote it.
 * - Modules must call setEnabled every cycle they run, otherwise they
 *   inherit whatever the previous module left behind.
 * - The flag alone never deploys the pet; the user preference gates it.
 */
export class CorePet_EnableArbiter {
    private enabled = false

    constructor(private readonly debug: CorePet_DebugLog) {}

    isEnabled(): boolean {
        return this.enabled
    }

    setEnabled(enabled: boolean): void {
        if (this.enabled !== enabled) {
            this.debug.log(`enabled ${this.enabled} -> ${enabled}`)
        }
        this.enabled = enabled
    }

    isUsable(userPetEnabled: boolean): boolean {
        return this.enabled && userPetEnabled
    }

    /** New host session */
    reset(): void {
        this.enabled = false
    }
}

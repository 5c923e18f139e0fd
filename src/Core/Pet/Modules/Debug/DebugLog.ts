/**
 * CorePet_DebugLog
 *
 * Console trace of pet state transitions.
 * Disabled instances drop everything.
 */
export class CorePet_DebugLog {
    constructor(public enabled: boolean = false) {}

    log(message: string): void {
        if (!this.enabled) return
        console.log(`[pet] ${message}`)
    }
}

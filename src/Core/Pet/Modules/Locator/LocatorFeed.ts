import { EventEmitter } from 'node:events'

import type {
    CorePet_Location,
    CorePet_LocatorSnapshot,
    CorePet_NpcInfo,
} from '../../Game/PetGameState'
import { CorePet_DebugLog } from '../Debug/DebugLog'

/** Emitted when the set of NPCs on the pet locator changes */
export class CorePet_LocatorNpcListChangeEvent {
    constructor(public readonly locatorNpcs: readonly CorePet_NpcInfo[]) {}
}

export type CorePet_LocatorListener = (
    event: CorePet_LocatorNpcListChangeEvent
) => void

const CHANGE = 'npc-list-change'
const EMPTY: readonly CorePet_NpcInfo[] = Object.freeze([])

/**
 * CorePet_LocatorFeed
 *
 * Holds the latest locator snapshot.
 *
 * - ingest() replaces the snapshot wholesale every time.
 * - A change event fires only when NPC membership (by id) differs
 *   from the previous snapshot. Stat churn on the same NPCs is silent.
 * - The event carries the full new set, not the delta.
 */
export class CorePet_LocatorFeed {
    private npcs: readonly CorePet_NpcInfo[] = EMPTY
    private ids: ReadonlySet<number> = new Set()
    private pingLocation: CorePet_Location | null = null
    private readonly events = new EventEmitter()

    constructor(private readonly debug: CorePet_DebugLog) {}

    /**
     * Feed a new snapshot. Null means the locator is unavailable and
     * counts as an empty set with no ping.
     */
    ingest(snapshot: CorePet_LocatorSnapshot | null): void {
        const npcs = snapshot ? dedupe(snapshot.npcs) : EMPTY
        const ids = new Set(npcs.map((n) => n.id))
        const changed = !sameMembers(this.ids, ids)

        this.npcs = npcs
        this.ids = ids
        this.pingLocation = snapshot?.pingLocation ?? null

        if (!changed) return

        this.debug.log(`locator npcs changed (${npcs.length})`)
        this.events.emit(CHANGE, new CorePet_LocatorNpcListChangeEvent(npcs))
    }

    getLocatorNpcLoc(): CorePet_Location | null {
        return this.pingLocation
    }

    getLocatorNpcs(): readonly CorePet_NpcInfo[] {
        return this.npcs
    }

    /** Subscribe; returns the unsubscribe function. */
    onNpcListChange(listener: CorePet_LocatorListener): () => void {
        this.events.on(CHANGE, listener)
        return () => {
            this.events.off(CHANGE, listener)
        }
    }

    /** Drop the snapshot without notifying. */
    reset(): void {
        this.npcs = EMPTY
        this.ids = new Set()
        this.pingLocation = null
    }
}

/** Last occurrence of an id wins; the result is frozen. */
function dedupe(
    npcs: readonly CorePet_NpcInfo[]
): readonly CorePet_NpcInfo[] {
    if (npcs.length === 0) return EMPTY

    const byId = new Map<number, CorePet_NpcInfo>()
    for (const npc of npcs) {
        byId.delete(npc.id)
        byId.set(npc.id, npc)
    }
    return Object.freeze([...byId.values()])
}

function sameMembers(a: ReadonlySet<number>, b: ReadonlySet<number>): boolean {
    if (a.size !== b.size) return false
    for (const id of a) {
        if (!b.has(id)) return false
    }
    return true
}

import type {
    CorePet_IGameCommands,
    CorePet_IGameState,
    CorePet_LocatorSnapshot,
    CorePet_NpcInfo,
    CorePet_PetStat,
    CorePet_Stat,
} from '../../../src/Core/Pet/Game/PetGameState'

export type FakeCommand =
    | { type: 'selectGear'; gearId: number }
    | { type: 'repairPet' }
    | { type: 'setPetDeployed'; deployed: boolean }

/**
 * In-process stand-in for the game: mutable raw state plus a log of
 * the commands the controller issued.
 */
export class FakeGame implements CorePet_IGameState, CorePet_IGameCommands {
    equipped: number[] = []
    currentGear: number | null = null
    cooldowns = new Set<number>()
    stats = new Map<CorePet_Stat, CorePet_PetStat>()
    active = false
    repaired = true
    repairCount = 0
    locator: CorePet_LocatorSnapshot | null = null

    cooldownReads = 0
    commands: FakeCommand[] = []

    getEquippedGearIds(): readonly number[] {
        return this.equipped
    }

    getCurrentGearId(): number | null {
        return this.currentGear
    }

    hasCooldown(cooldownId: number): boolean {
        this.cooldownReads++
        return this.cooldowns.has(cooldownId)
    }

    getStat(stat: CorePet_Stat): CorePet_PetStat {
        return this.stats.get(stat) ?? { current: 0, total: 0 }
    }

    isPetActive(): boolean {
        return this.active
    }

    isPetRepaired(): boolean {
        return this.repaired
    }

    getRepairCount(): number {
        return this.repairCount
    }

    readLocator(): CorePet_LocatorSnapshot | null {
        return this.locator
    }

    selectGear(gearId: number): void {
        this.commands.push({ type: 'selectGear', gearId })
    }

    repairPet(): void {
        this.commands.push({ type: 'repairPet' })
    }

    setPetDeployed(deployed: boolean): void {
        this.commands.push({ type: 'setPetDeployed', deployed })
    }
}

/** Manually advanced ms clock */
export class FakeClock {
    constructor(public now: number = 0) {}

    advance(ms: number): void {
        this.now += ms
    }

    read = (): number => this.now
}

export function npc(id: number, name: string, health = 100): CorePet_NpcInfo {
    return { id, name, health }
}

/**
 * CorePet_PetGear:
 * Immutable reference data for pet gears and their cooldowns.
 *
 * Notes:
 * - Gear ids are what the game reports and accepts.
 * - A gear has at most one cooldown. Gears without a cooldown
 *   never report one.
 */

export interface CorePet_Cooldown {
    readonly id: number
    readonly name: string
}

export interface CorePet_PetGear {
    readonly id: number
    readonly name: string
    readonly cooldown: CorePet_Cooldown | null
}

/** Anything the API accepts where a gear is expected */
export type CorePet_GearRef = number | CorePet_PetGear

const cooldown = (id: number, name: string): CorePet_Cooldown =>
    Object.freeze({ id, name })

export const CorePet_Cooldowns = Object.freeze({
    KAMIKAZE: cooldown(1, 'kamikaze'),
    COMBO_REPAIR: cooldown(2, 'combo_repair'),
    SACRIFICE: cooldown(3, 'sacrifice'),
    HP_LINK: cooldown(4, 'hp_link'),
    MEGA_MINE: cooldown(5, 'mega_mine'),
    ENEMY_LOCATOR: cooldown(6, 'enemy_locator'),
})

const gear = (
    id: number,
    name: string,
    cd: CorePet_Cooldown | null = null
): CorePet_PetGear => Object.freeze({ id, name, cooldown: cd })

export const CorePet_PetGears = Object.freeze({
    PASSIVE: gear(1, 'PASSIVE'),
    GUARD: gear(2, 'GUARD'),
    AUTO_LOOT: gear(3, 'AUTO_LOOT'),
    AUTO_RESOURCE: gear(4, 'AUTO_RESOURCE'),
    ENEMY_LOCATOR: gear(5, 'ENEMY_LOCATOR', CorePet_Cooldowns.ENEMY_LOCATOR),
    RESOURCE_LOCATOR: gear(6, 'RESOURCE_LOCATOR'),
    KAMIKAZE: gear(7, 'KAMIKAZE', CorePet_Cooldowns.KAMIKAZE),
    COMBO_REPAIR: gear(8, 'COMBO_REPAIR', CorePet_Cooldowns.COMBO_REPAIR),
    REPAIR_PET: gear(9, 'REPAIR_PET'),
    SACRIFICE: gear(10, 'SACRIFICE', CorePet_Cooldowns.SACRIFICE),
    HP_LINK: gear(11, 'HP_LINK', CorePet_Cooldowns.HP_LINK),
    MEGA_MINE: gear(12, 'MEGA_MINE', CorePet_Cooldowns.MEGA_MINE),
    COMBO_GUARD: gear(13, 'COMBO_GUARD'),
})

const byId = new Map<number, CorePet_PetGear>(
    Object.values(CorePet_PetGears).map((g) => [g.id, g])
)

/** Look up a gear by id. Unknown ids return null. */
export function CorePet_gearById(id: number): CorePet_PetGear | null {
    return byId.get(id) ?? null
}

/** Look up a gear by its name, case-insensitive. */
export function CorePet_gearByName(name: string): CorePet_PetGear | null {
    const key = name.trim().toUpperCase()
    for (const g of byId.values()) {
        if (g.name === key) return g
    }
    return null
}

export function CorePet_gearIdOf(ref: CorePet_GearRef): number {
    return typeof ref === 'number' ? ref : ref.id
}

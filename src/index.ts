export { CorePet_PetController } from './Core/Pet/PetController'
export type { CorePet_ControllerOptions } from './Core/Pet/PetController'
export type { CorePet_PetAPI, CorePet_PetHostAPI } from './Core/Pet/PetAPI'
export type { CorePet_TickContext } from './Core/Pet/TickContext'

export {
    CorePet_defaultPetConfig,
    CorePet_loadPetConfig,
    CorePet_parsePetConfig,
} from './Core/Pet/Config/PetConfig'
export type { CorePet_PetConfig, CorePet_IntervalConfig } from './Core/Pet/Config/PetConfig'

export { CorePet_ItemNotEquippedError } from './Core/Pet/Errors/ItemNotEquippedError'

export { CorePet_STATS } from './Core/Pet/Game/PetGameState'
export type {
    CorePet_IGameCommands,
    CorePet_IGameState,
    CorePet_Location,
    CorePet_LocatorSnapshot,
    CorePet_NpcInfo,
    CorePet_PetStat,
    CorePet_Stat,
} from './Core/Pet/Game/PetGameState'

export {
    CorePet_Cooldowns,
    CorePet_PetGears,
    CorePet_gearById,
    CorePet_gearByName,
} from './Core/Pet/Game/PetGear'
export type { CorePet_Cooldown, CorePet_GearRef, CorePet_PetGear } from './Core/Pet/Game/PetGear'

export type { CorePet_CooldownRef } from './Core/Pet/Modules/Cooldown/CooldownTracker'
export { CorePet_DEFAULT_GEAR_GRACE_MS } from './Core/Pet/Modules/Gear/GearOverride'
export type { CorePet_GearRequest } from './Core/Pet/Modules/Gear/GearOverride'
export type { CorePet_IGearSelector } from './Core/Pet/Modules/Gear/IGearSelector'
export { CorePet_LocatorNpcListChangeEvent } from './Core/Pet/Modules/Locator/LocatorFeed'
export type { CorePet_LocatorListener } from './Core/Pet/Modules/Locator/LocatorFeed'

/** Thrown by setGear when the gear is not equipped or does not exist */
export class CorePet_ItemNotEquippedError extends Error {
    constructor(public readonly gearId: number) {
        super(`Pet gear ${gearId} is not equipped`)
        this.name = 'ItemNotEquippedError'
    }
}

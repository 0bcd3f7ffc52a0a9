import { type Size } from '../types/rectangle.js';
import { sameSize, swapped } from '../algorithms/shape-groups.js';

/**
 * The multiset of rectangles still awaiting placement during one allocation run.
 * Owned by the allocation loop; never shared between runs.
 */
export class ItemPool {
    private readonly _items: Size[];

    constructor(items: readonly Size[]) {
        this._items = [...items];
    }

    get size(): number {
        return this._items.length;
    }

    get isEmpty(): boolean {
        return this._items.length === 0;
    }

    /**
     * A copy of the remaining items, in their original orientation and order.
     */
    get items(): Size[] {
        return [...this._items];
    }

    /**
     * Removes one item matching a placed size: the first exact-orientation match,
     * else the first swapped-orientation match.
     * @returns Whether an item was removed.
     */
    take(placed: Size): boolean {
        let index = this._items.findIndex((s) => sameSize(s, placed));
        if (index === -1) {
            const rotated = swapped(placed);
            index = this._items.findIndex((s) => sameSize(s, rotated));
        }
        if (index === -1) {
            return false;
        }
        this._items.splice(index, 1);
        return true;
    }
}

/**
 * @module spaces/wall-space
 * @description Rectangular space with axis-aligned box walls
 */

import { ConfigurationError, ErrorCodes } from '../core/errors';
import { validateBox, type BoxSpace } from '../core/space';
import type { Configuration } from '../planning/configuration';
import { EmptySpace } from './empty-space';
import { pointInBox, segmentIntersectsBox } from './geometry';

export class WallSpace extends EmptySpace {
    readonly walls: readonly BoxSpace[];

    constructor(bounds: BoxSpace, walls: readonly BoxSpace[] = []) {
        super(bounds);

        const errors: string[] = [];
        walls.forEach((wall, i) => {
            if (wall.low.length !== bounds.low.length) {
                errors.push(`wall ${i}: dimension ${wall.low.length}, expected ${bounds.low.length}`);
            }
            errors.push(...validateBox(wall).errors.map(e => `wall ${i}: ${e}`));
        });
        if (errors.length > 0) {
            throw new ConfigurationError('Invalid walls', ErrorCodes.INVALID_CONFIG, errors);
        }
        this.walls = [...walls];
    }

    isValidConfiguration(config: Configuration): boolean {
        return super.isValidConfiguration(config) && !this.walls.some(w => pointInBox(w, config));
    }

    isValidMotion(from: Configuration, to: Configuration): boolean {
        return super.isValidMotion(from, to) && !this.walls.some(w => segmentIntersectsBox(from, to, w));
    }
}

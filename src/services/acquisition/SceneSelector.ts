import type { SceneRecord, SelectionResult } from '../../types/scene.js';
import { subtractDays, wholeDaysBetween } from '../../utils/dateUtils.js';

interface DatedScene {
    scene: SceneRecord;
    time: Date;
}

function withValidTime(records: readonly SceneRecord[]): DatedScene[] {
    const dated: DatedScene[] = [];
    for (const scene of records) {
        if (scene.acquisitionTime === null) {
            continue;
        }
        const time = new Date(scene.acquisitionTime);
        if (!isNaN(time.getTime())) {
            dated.push({ scene, time });
        }
    }
    return dated;
}

/**
 * Pick the scenes to acquire for one run: the most recent scene, plus the
 * scene closest to `now - daysBack` when that is a different granule.
 *
 * Pure function of its arguments. Ties resolve to the first record in input
 * order, both for the most recent pick and for the closest-to-target pick.
 * Distance to the target is counted in whole days, floored.
 */
export function selectScenes(records: readonly SceneRecord[], daysBack: number, now: Date): SelectionResult {
    const target = subtractDays(now, daysBack);
    const dated = withValidTime(records);

    if (dated.length === 0) {
        return {
            scenes: [],
            mostRecent: null,
            closestToTarget: null,
            targetTime: target.toISOString(),
            daysFromTarget: null,
            noValidScenes: true,
        };
    }

    // Stable descending sort: equal timestamps keep input order
    const byRecency = [...dated].sort((a, b) => b.time.getTime() - a.time.getTime());
    const mostRecent = byRecency[0];

    let closest = dated[0];
    let closestDistance = Math.abs(wholeDaysBetween(closest.time, target));
    for (const candidate of dated.slice(1)) {
        const distance = Math.abs(wholeDaysBetween(candidate.time, target));
        if (distance < closestDistance) {
            closest = candidate;
            closestDistance = distance;
        }
    }

    const scenes = closest.scene.granuleName === mostRecent.scene.granuleName
        ? [mostRecent.scene]
        : [mostRecent.scene, closest.scene];

    return {
        scenes,
        mostRecent: mostRecent.scene,
        closestToTarget: closest.scene,
        targetTime: target.toISOString(),
        daysFromTarget: closestDistance,
        noValidScenes: false,
    };
}

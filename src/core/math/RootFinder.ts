export interface RootFinderOptions {
    /** Half-width of the final bracket at which the search stops */
    tolerance: number;
    /** Bisection steps allowed before giving up */
    maxIterations: number;
}

export interface RootResult {
    root: number;
    iterations: number;
}

export type RootFindingFailure = 'not-bracketed' | 'no-convergence';

export class RootFindingError extends Error {
    constructor(
        public readonly reason: RootFindingFailure,
        public readonly bracket: readonly [number, number],
        message: string
    ) {
        super(message);
        this.name = 'RootFindingError';
    }
}

export const DEFAULT_ROOT_FINDER_OPTIONS: RootFinderOptions = {
    tolerance: 1e-9,
    maxIterations: 200,
};

/**
 * Find a zero of f inside [lo, hi] by bisection.
 * f(lo) and f(hi) must have opposite signs (or one of them be zero).
 */
export function findRoot(
    f: (x: number) => number,
    bracket: readonly [number, number],
    options: Partial<RootFinderOptions> = {}
): RootResult {
    const tolerance = options.tolerance ?? DEFAULT_ROOT_FINDER_OPTIONS.tolerance;
    const maxIterations = options.maxIterations ?? DEFAULT_ROOT_FINDER_OPTIONS.maxIterations;

    let lo = bracket[0];
    let hi = bracket[1];
    let fLo = f(lo);
    const fHi = f(hi);

    if (fLo === 0) return { root: lo, iterations: 0 };
    if (fHi === 0) return { root: hi, iterations: 0 };

    if (!Number.isFinite(fLo) || !Number.isFinite(fHi) || Math.sign(fLo) === Math.sign(fHi)) {
        throw new RootFindingError(
            'not-bracketed',
            bracket,
            `f(${lo}) = ${fLo} and f(${hi}) = ${fHi} do not bracket a root`
        );
    }

    for (let i = 1; i <= maxIterations; i++) {
        const mid = (lo + hi) / 2;
        const fMid = f(mid);

        if (fMid === 0 || (hi - lo) / 2 <= tolerance) {
            return { root: mid, iterations: i };
        }

        if (Math.sign(fMid) === Math.sign(fLo)) {
            lo = mid;
            fLo = fMid;
        } else {
            hi = mid;
        }
    }

    throw new RootFindingError(
        'no-convergence',
        bracket,
        `No convergence to ${tolerance} within ${maxIterations} iterations`
    );
}

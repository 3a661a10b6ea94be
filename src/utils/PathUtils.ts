import * as fs from "fs";
import * as path from "path";

function isInside(candidate: string, root: string): boolean {
    const relative = path.relative(root, candidate);
    return relative === "" || (relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative));
}

/**
 * True when `inputPath` stays inside `root`, both as written and after
 * resolving symlinks. A path whose real location cannot be read is rejected.
 */
export function isWithinRoot(inputPath: string, root: string = process.cwd()): boolean {
    const allowedRoot = path.resolve(root);
    const resolved = path.resolve(inputPath);

    if (!isInside(resolved, allowedRoot)) {
        return false;
    }
    if (!fs.existsSync(resolved)) {
        return true;
    }

    try {
        return isInside(fs.realpathSync(resolved), fs.realpathSync(allowedRoot));
    } catch {
        return false;
    }
}

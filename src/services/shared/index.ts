export { generateId } from './id';
export {
    bytesToBase62,
    generateRandomBytes,
    hashSHA256,
    generateRandomToken,
    generateLicenseKey,
    normalizeLicenseKey,
    hashLicenseKey,
} from './crypto';
export { nowMs, nowSeconds, isExpired, toIso } from './time';
export { ok, err, mapResult } from './result';
export {
    hashMachineData,
    maskLicensePath,
    partialLicenseKey,
    partialMachineData,
    partialEmail,
    sanitizeDetails,
} from './privacy';

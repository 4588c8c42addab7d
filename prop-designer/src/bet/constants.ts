/**
 * Physical constants and unit conversions shared by the BET library.
 */

export const DEG2RAD = Math.PI / 180
export const RAD2DEG = 180 / Math.PI

/** ISA sea-level air density [kg/m³] */
export const SEA_LEVEL_AIR_DENSITY = 1.225

/** RPM → rad/s */
export const RPM_TO_RAD_PER_SEC = 2 * Math.PI / 60

/**
 * Astronomical constants (shared), in cgs.
 *
 * Goal: keep the unit table, the writer and tooling numerically consistent.
 * Values follow IAU 2015 nominal values where applicable.
 */

// Astronomical unit (cm).
export const AU_CM = 1.495_978_707e13;

// Parsec (cm): 648000/π AU.
export const PARSEC_CM = (648_000 / Math.PI) * AU_CM;
export const KILOPARSEC_CM = 1e3 * PARSEC_CM;
export const MEGAPARSEC_CM = 1e6 * PARSEC_CM;

// Nominal solar mass (g), GM_sun / G with CODATA 2018 G.
export const SOLAR_MASS_G = 1.988_409_870_698_051e33;

// Julian year (s).
export const YEAR_S = 365.25 * 86_400;
export const MEGAYEAR_S = 1e6 * YEAR_S;
export const GIGAYEAR_S = 1e9 * YEAR_S;

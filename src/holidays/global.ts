// Holidays observed worldwide.

import { Holiday } from "../holiday.js";

/** January 1 */
export const NEW_YEARS_DAY = Holiday.fixed("New Year's Day", 1, 1);

/** March 17 */
export const ST_PATRICKS_DAY = Holiday.fixed("St. Patrick's Day", 3, 17);

/** December 24 */
export const CHRISTMAS_EVE = Holiday.fixed("Christmas Eve", 12, 24);

/** December 25 */
export const CHRISTMAS = Holiday.fixed("Christmas", 12, 25);

/** December 31 */
export const NEW_YEARS_EVE = Holiday.fixed("New Year's Eve", 12, 31);

/** number of milliseconds in one second */
export const MS_PER_SECOND = 1000;

/** RGBA color, each channel 0-1 */
export type Color = [number, number, number, number];

export const WHITE: Color = [1, 1, 1, 1];

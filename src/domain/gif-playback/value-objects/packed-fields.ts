// Logical screen descriptor, packed byte.
export const hasGlobalColorTable = (packed: number): boolean => (packed & 0x80) !== 0;
export const colorResolutionOf = (packed: number): number => ((packed >> 4) & 0x07) + 1;
export const isGlobalTableSorted = (packed: number): boolean => (packed & 0x08) !== 0;

// Image descriptor, packed byte.
export const hasLocalColorTable = (packed: number): boolean => (packed & 0x80) !== 0;
export const isInterlaced = (packed: number): boolean => (packed & 0x40) !== 0;
export const isLocalTableSorted = (packed: number): boolean => (packed & 0x20) !== 0;

/** Low three bits, shared by both descriptors. */
export const colorTableSizeOf = (packed: number): number => packed & 0x07;

// Graphics control extension, packed byte.
export const disposalMethodOf = (packed: number): number => (packed >> 2) & 0x07;
export const hasTransparentColor = (packed: number): boolean => (packed & 0x01) !== 0;

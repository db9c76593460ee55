/** Room attribute bits */
export const RoomAttrs = {
  PUBLIC_READABLE: 1 << 0,
} as const;

export interface RoomInfo {
  id: string;
  attrs: number;
  title: string;
  creator: string;
  createdAt: number; // Unix seconds
}

export function isPublicReadable(attrs: number): boolean {
  return (attrs & RoomAttrs.PUBLIC_READABLE) !== 0;
}

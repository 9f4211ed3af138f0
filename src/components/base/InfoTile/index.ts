export { InfoTile } from './InfoTile';
export type { InfoTileProps } from './InfoTile';

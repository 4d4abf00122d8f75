/**
 * Link model
 *
 * A directed relationship between two linked intersections. Derived from
 * agent positions on demand, never stored on its own.
 */

export interface LinkOffset {
  fromId: string;
  toId: string;
  distanceM: number;
  travelTimeS: number;
  /** Cycle length of the downstream (`toId`) signal */
  cycleLengthS: number;
  /** Green-wave phase-start delay for the downstream signal, in [0, cycleLengthS) */
  offsetS: number;
  /** Farther apart than the connection distance; advisory only */
  outOfRange: boolean;
}

export interface NetworkNode {
  id: string;
  name: string;
  latitude: number;
  longitude: number;
  online: boolean;
}

export interface NetworkView {
  nodes: NetworkNode[];
  links: LinkOffset[];
}

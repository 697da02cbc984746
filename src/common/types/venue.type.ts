/**
 * The two price venues the engine compares.
 * Positions are only ever held on the reference venue.
 */
export enum VenueRole {
  REFERENCE = 'reference',
  COMPARISON = 'comparison',
}

export type GatewayMode = 'test' | 'live';

// DeFiLlama registry records and the resolver's output contract

/** One entry of the `/protocols` snapshot. */
export interface ProtocolRecord {
  slug: string;
  name: string;
  category?: string;
  /** `parent#<parent-slug>` when the protocol belongs to an umbrella group. */
  parentProtocol?: string;
}

export interface ChildProtocol {
  name: string;
  slug: string;
}

export interface ResolutionResult {
  slug: string;
  name: string;
  isParent: boolean;
  children: ChildProtocol[];
  category?: string;
}

export type MatchKind = 'slug' | 'name' | 'parent';

export interface IconIdentifier {
  readonly collection: string;
  readonly iconName: string;
  readonly fullName: string;
}

export interface IconRecord {
  readonly body: string;
  readonly width: number;
  readonly height: number;
  readonly viewBox: string;
}

export interface ResolvedIcon {
  identifier: IconIdentifier;
  record: IconRecord;
}

export interface CollectionInfo {
  name?: string;
  author?: string;
  license?: string;
}

// Raw icon as served by the registry, before dimension resolution
export interface RegistryIcon {
  body: string;
  width?: number;
  height?: number;
  left?: number;
  top?: number;
  viewBox?: string;
}

export interface RegistryIconSet {
  icons: Record<string, RegistryIcon>;
  width?: number;
  height?: number;
  left?: number;
  top?: number;
  notFound: string[];
}

export interface IconFetcher {
  fetchIcons(collection: string, names: string[]): Promise<RegistryIconSet>;
  fetchCollectionInfo(collection: string): Promise<CollectionInfo>;
}

export interface SvgDimensionAttributes {
  width?: string;
  height?: string;
  viewBox?: string;
}

export interface ResolvedDimensions {
  width: number;
  height: number;
  viewBox: string;
}

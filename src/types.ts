/**
 * Scan report schema consumed by the component-graph builder.
 * Field names follow the scanner's JSON report output.
 */

export type ArtifactType =
  | 'container_image'
  | 'filesystem'
  | 'repository'
  | 'cyclonedx'
  | 'spdx'
  | 'vm'
  | 'aws_account';

export type ResultClass =
  | 'os-pkgs'
  | 'lang-pkgs'
  | 'config'
  | 'secret'
  | 'license'
  | 'license-file'
  | 'custom';

/** Ecosystem or target type tag, e.g. "npm", "alpine", "node-pkg" */
export type TargetType = string;

export interface OS {
  Family: string;
  Name: string;
  Eosl?: boolean;
}

export interface ImageConfig {
  architecture?: string;
  os?: string;
}

export interface Metadata {
  Size?: number;
  OS?: OS;
  ImageID?: string;
  DiffIDs?: string[];
  RepoTags?: string[];
  RepoDigests?: string[];
  ImageConfig?: ImageConfig;
}

export interface Layer {
  Digest?: string;
  DiffID?: string;
}

export interface PkgIdentifier {
  PURL?: string;
  BOMRef?: string;
  UID?: string;
}

export interface Package {
  ID?: string;
  Name: string;
  Identifier?: PkgIdentifier;
  Version: string;
  Release?: string;
  Epoch?: number;
  Arch?: string;
  SrcName?: string;
  SrcVersion?: string;
  SrcRelease?: string;
  SrcEpoch?: number;
  Modularitylabel?: string;
  Licenses?: string[];
  Maintainer?: string;
  Indirect?: boolean;
  DependsOn?: string[];
  Layer?: Layer;
  FilePath?: string;
  Digest?: string;
}

/**
 * A vulnerability already matched against a package upstream.
 * Only the keys used for matching are typed; the rest is carried through as-is.
 */
export interface DetectedVulnerability {
  VulnerabilityID: string;
  PkgID?: string;
  PkgName: string;
  InstalledVersion: string;
  FixedVersion?: string;
  Severity?: string;
  Title?: string;
  [field: string]: unknown;
}

export interface Result {
  Target: string;
  Class?: ResultClass;
  Type?: TargetType;
  Packages?: Package[];
  Vulnerabilities?: DetectedVulnerability[];
}

export interface CycloneDXProperty {
  Name: string;
  Value: string;
}

export interface CycloneDXComponent {
  Name: string;
  Group?: string;
  Version?: string;
  Type?: string;
  PackageURL?: string;
  Properties?: CycloneDXProperty[];
}

/** Declared metadata of an SBOM document scanned as the artifact itself */
export interface CycloneDXDocument {
  Metadata: {
    Component: CycloneDXComponent;
  };
}

export interface Report {
  SchemaVersion: number;
  CreatedAt?: string;
  ArtifactName: string;
  ArtifactType: ArtifactType;
  Metadata: Metadata;
  Results?: Result[];
  CycloneDX?: CycloneDXDocument;
}

/**
 * JSON output schema for the component graph
 */
export interface ComponentRefJson {
  ref: string;
}

export interface ComponentJson {
  'bom-ref': string;
  type?: string;
  name: string;
  group?: string;
  version?: string;
  purl?: string;
  supplier?: string;
  licenses?: string[];
  hashes?: string[];
  properties?: { name: string; value: string }[];
  /** IDs of the vulnerabilities matched against this component */
  vulnerabilities?: string[];
  components?: (ComponentJson | ComponentRefJson)[];
}

export interface GraphJson {
  metadata: {
    timestamp: string;
    tool: { name: string; version: string };
  };
  component: ComponentJson;
}

import { NAMESPACE, type Property } from './component.js';

export const PropertySchemaVersion = 'SchemaVersion';
export const PropertyType = 'Type';
export const PropertyClass = 'Class';

// Image properties
export const PropertySize = 'Size';
export const PropertyImageID = 'ImageID';
export const PropertyRepoDigest = 'RepoDigest';
export const PropertyDiffID = 'DiffID';
export const PropertyRepoTag = 'RepoTag';

// Package properties
export const PropertyPkgID = 'PkgID';
export const PropertyPkgType = 'PkgType';
export const PropertySrcName = 'SrcName';
export const PropertySrcVersion = 'SrcVersion';
export const PropertySrcRelease = 'SrcRelease';
export const PropertySrcEpoch = 'SrcEpoch';
export const PropertyModularitylabel = 'Modularitylabel';
export const PropertyFilePath = 'FilePath';
export const PropertyLayerDigest = 'LayerDigest';
export const PropertyLayerDiffID = 'LayerDiffID';

/**
 * Build a property in this tool's namespace.
 * Missing values become empty strings so that `filterProperties` drops them.
 */
export function property(name: string, value: string | number | undefined): Property {
  return {
    namespace: NAMESPACE,
    name,
    value: value === undefined ? '' : String(value),
  };
}

/**
 * Drop properties with no value, and SrcEpoch "0", which means no epoch.
 * Order is preserved.
 */
export function filterProperties(props: Property[]): Property[] {
  return props.filter(
    (prop) => !(prop.value === '' || (prop.name === PropertySrcEpoch && prop.value === '0')),
  );
}

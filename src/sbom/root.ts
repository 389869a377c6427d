import type { CycloneDXComponent, Report } from '../types.js';
import { isComponentType, NAMESPACE, type Component, type Property } from './component.js';
import {
  filterProperties,
  property,
  PropertyDiffID,
  PropertyImageID,
  PropertyRepoDigest,
  PropertyRepoTag,
  PropertySchemaVersion,
  PropertySize,
} from './properties.js';
import { ociPurl, parsePurl } from './purl.js';

/**
 * Component for the scanned artifact as a whole.
 *
 * @throws PackageUrlError when the image purl cannot be built, or when a
 * passthrough SBOM declares a malformed purl
 */
export function rootComponent(report: Report): Component {
  const root: Component = {
    name: report.ArtifactName,
    properties: [],
    components: [],
  };
  const metadata = report.Metadata;
  const props: Property[] = [property(PropertySchemaVersion, report.SchemaVersion)];

  switch (report.ArtifactType) {
    case 'container_image':
      root.type = 'container';
      props.push(property(PropertyImageID, metadata.ImageID));
      root.purl = ociPurl(metadata);
      break;
    case 'vm':
      root.type = 'container';
      break;
    case 'filesystem':
    case 'repository':
      root.type = 'application';
      break;
    case 'cyclonedx':
      if (!report.CycloneDX) {
        throw new Error(`CycloneDX artifact ${report.ArtifactName} has no metadata component`);
      }
      return toCoreComponent(report.CycloneDX.Metadata.Component);
  }

  if (metadata.Size) {
    props.push(property(PropertySize, metadata.Size));
  }
  if (metadata.RepoDigests?.length) {
    props.push(property(PropertyRepoDigest, metadata.RepoDigests.join(',')));
  }
  if (metadata.DiffIDs?.length) {
    props.push(property(PropertyDiffID, metadata.DiffIDs.join(',')));
  }
  if (metadata.RepoTags?.length) {
    props.push(property(PropertyRepoTag, metadata.RepoTags.join(',')));
  }

  root.properties = filterProperties(props);
  return root;
}

/**
 * Convert the metadata component of an SBOM that was scanned as the artifact.
 * Every property lands in our namespace: names already carrying the prefix are
 * split so it isn't applied twice, foreign names keep their full text.
 */
export function toCoreComponent(c: CycloneDXComponent): Component {
  const properties: Property[] = (c.Properties ?? []).map((prop) =>
    prop.Name.startsWith(NAMESPACE)
      ? { namespace: NAMESPACE, name: prop.Name.slice(NAMESPACE.length), value: prop.Value }
      : { namespace: NAMESPACE, name: prop.Name, value: prop.Value },
  );

  return {
    type: isComponentType(c.Type) ? c.Type : undefined,
    name: c.Name,
    group: c.Group || undefined,
    version: c.Version || undefined,
    purl: c.PackageURL ? parsePurl(c.PackageURL) : undefined,
    properties,
    components: [],
  };
}

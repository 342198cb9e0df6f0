/**
 * XML namespaces used by NAS documents
 */

/** Prefix shared by all AdV application schema versions (6.0, 7.1, ...) */
export const ADV_NAMESPACE_PREFIX = 'http://www.adv-online.de/namespaces/adv/gid/';

export const GML_NAMESPACES = [
  'http://www.opengis.net/gml/3.2',
  'http://www.opengis.net/gml',
] as const;

export const XLINK_NAMESPACE = 'http://www.w3.org/1999/xlink';

/** Prefix of object identifiers in xlink:href references and gml:id values */
export const ID_PREFIX = 'urn:adv:oid:';

/** Prefix of reference system identifiers */
export const CRS_PREFIX = 'urn:adv:crs:';

export function isAdvNamespace(uri: string | null): boolean {
  return uri !== null && uri.startsWith(ADV_NAMESPACE_PREFIX);
}

export function isGmlNamespace(uri: string | null): boolean {
  return uri !== null && GML_NAMESPACES.some((ns) => ns === uri);
}

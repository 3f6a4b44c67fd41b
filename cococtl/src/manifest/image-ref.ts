/**
 * Repository name of an image reference: the last path segment, without tag
 * or digest. `quay.io/confidential-containers/payload:v0.11.0@sha256:…` → `payload`.
 */
export function repositoryName(image: string): string {
  const withoutDigest = image.split("@")[0] ?? image;
  const lastSlash = withoutDigest.lastIndexOf("/");
  const lastColon = withoutDigest.lastIndexOf(":");
  const withoutTag = lastColon > lastSlash ? withoutDigest.slice(0, lastColon) : withoutDigest;
  return withoutTag.slice(lastSlash + 1);
}

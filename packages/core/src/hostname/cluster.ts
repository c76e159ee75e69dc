/**
 * Derive the cluster (machine group) name from a hostname: the second
 * dot-separated label, or the whole hostname when it has no dot.
 *
 * `login03.jureca.fz-juelich.de` -> `jureca`, `node.cluster` -> `cluster`,
 * `workstation` -> `workstation`. An empty second label (`host.`) also
 * falls back to the whole hostname.
 */
export function deriveClusterName(hostname: string): string {
  const second = hostname.split('.')[1]
  return second ? second : hostname
}

import type { ConnectionRecord, ReportScope } from '../../types/index.js';
import type { AddressClassifier } from '../../services/ipv4.js';

/**
 * Split the aggregate into report scopes:
 * - all: everything
 * - internal: both endpoints in a private network
 * - public: remote endpoint public, neither endpoint loopback
 */
export function partitionByScope(
  records: readonly ConnectionRecord[],
  classifier: AddressClassifier,
): Record<ReportScope, ConnectionRecord[]> {
  const internal: ConnectionRecord[] = [];
  const publicRows: ConnectionRecord[] = [];
  for (const r of records) {
    if (classifier.isPrivate(r.local_ip) && classifier.isPrivate(r.remote_ip)) internal.push(r);
    if (
      r.is_public_remote &&
      !classifier.isLoopback(r.local_ip) &&
      !classifier.isLoopback(r.remote_ip)
    ) {
      publicRows.push(r);
    }
  }
  return { all: [...records], internal, public: publicRows };
}

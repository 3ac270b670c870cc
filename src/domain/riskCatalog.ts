import type { PricedRiskKind } from './industry.js';
import type { Severity } from './types.js';

export interface RiskDefinition {
  kind: PricedRiskKind;
  name: string;
  severity: Severity;
  /** Annual incident probability per finding. Heuristic, not fitted to incident data. */
  probability: number;
  description: string;
  typicalIncidents: readonly string[];
  /** `{unitCostK}` is replaced by the profile's unit cost in thousands. */
  industryExamples: readonly string[];
}

// Order is report order: critical first.
export const RISK_CATALOG: readonly RiskDefinition[] = [
  {
    kind: 'privilegedContainers',
    name: 'Privileged Containers',
    severity: 'critical',
    probability: 0.15,
    description: 'Containers with privileged mode can escape to host and compromise entire cluster',
    typicalIncidents: [
      'Container escape leading to node compromise',
      'Lateral movement across cluster',
      'Data exfiltration from host filesystem',
    ],
    industryExamples: [
      'Cryptomining via privileged container ($50K+ in compute costs)',
      'Average container escape incident cost: $25K',
    ],
  },
  {
    kind: 'hostPathVolumes',
    name: 'Host Path Volumes',
    severity: 'critical',
    probability: 0.2,
    description: 'Direct host filesystem access enables data exfiltration and credential theft',
    typicalIncidents: [
      'Access to /etc/shadow for credential theft',
      'Docker socket exploitation',
      'Reading application secrets from host',
    ],
    industryExamples: [
      'Docker socket abuse: average incident cost $35K',
      'Credential theft via hostPath is a recurring root cause in Kubernetes breaches',
    ],
  },
  {
    kind: 'hostPid',
    name: 'Host PID Namespace',
    severity: 'critical',
    probability: 0.12,
    description: 'Access to host processes enables process injection and privilege escalation',
    typicalIncidents: [
      'Process injection into privileged processes',
      'Information disclosure via /proc',
      'Signal-based denial of service',
    ],
    industryExamples: ['Host PID exploitation: ${unitCostK}K average incident cost'],
  },
  {
    kind: 'runningAsRoot',
    name: 'Containers Running as Root',
    severity: 'high',
    probability: 0.1,
    description: 'Root user in containers amplifies damage from application vulnerabilities',
    typicalIncidents: [
      'CVE exploitation with root privileges',
      'Container filesystem modification',
      'Capability abuse for lateral movement',
    ],
    industryExamples: [
      'Log4Shell with a root user: markedly more damage than non-root',
      'Root containers appear in most critical Kubernetes CVE write-ups',
    ],
  },
  {
    kind: 'hostNetwork',
    name: 'Host Network Usage',
    severity: 'high',
    probability: 0.08,
    description: 'Bypasses network policies enabling lateral movement and service impersonation',
    typicalIncidents: [
      'Bypass of network segmentation',
      'Service impersonation attacks',
      'Cluster-wide port scanning',
    ],
    industryExamples: ['Network policy bypass: ${unitCostK}K average incident'],
  },
  {
    kind: 'missingResourceLimits',
    name: 'Missing Resource Limits',
    severity: 'medium',
    probability: 0.25,
    description: 'Enables resource exhaustion attacks causing cluster-wide outages',
    typicalIncidents: [
      'Memory leak causing node eviction',
      'CPU spike affecting cluster performance',
      'OOMKilled cascading failures',
    ],
    industryExamples: [
      'Average cost of 1-hour production outage: ${unitCostK}K',
      'Resource exhaustion is a common cause of Kubernetes incidents',
    ],
  },
  {
    kind: 'defaultServiceAccount',
    name: 'Default Service Account Usage',
    severity: 'medium',
    probability: 0.06,
    description: 'Default service accounts often have excessive permissions enabling privilege escalation',
    typicalIncidents: [
      'Over-privileged API access from compromised pod',
      'Secret enumeration via service account token',
      'Namespace-wide resource manipulation',
    ],
    industryExamples: ['Service account abuse: ${unitCostK}K average incident'],
  },
];

import type {
  ApiImplementation,
  ComponentImplementation,
  SecurityFinding,
  SecurityScan,
  Severity,
} from '../../contracts/schemas.js';

interface SecurityRule {
  category: string;
  severity: Severity;
  pattern: RegExp;
  description: string;
}

const SOURCE_RULES: readonly SecurityRule[] = [
  {
    category: 'A02:2021-Cryptographic Failures',
    severity: 'high',
    pattern: /(password|secret|api_key)\s*[:=]\s*['"][^'"]+['"]/i,
    description: 'Hard-coded credential in source',
  },
  {
    category: 'A02:2021-Cryptographic Failures',
    severity: 'high',
    pattern: /createHash\(\s*['"](md5|sha1)['"]/i,
    description: 'Weak hash algorithm',
  },
  {
    category: 'A03:2021-Injection',
    severity: 'critical',
    pattern: /execute\([^)]*\+/,
    description: 'Query built by string concatenation',
  },
  {
    category: 'A03:2021-Injection',
    severity: 'critical',
    pattern: /dangerouslySetInnerHTML/,
    description: 'Raw HTML injected into the DOM',
  },
  {
    category: 'A03:2021-Injection',
    severity: 'critical',
    pattern: /\beval\s*\(/,
    description: 'Dynamic code evaluation',
  },
  {
    category: 'A03:2021-Injection',
    severity: 'critical',
    pattern: /\.innerHTML\s*=/,
    description: 'Direct innerHTML assignment',
  },
];

const GUARDED_ROUTE = /router\.\w+\([^)]*requireAuth/;

function scanSource(filePath: string, source: string): SecurityFinding[] {
  return SOURCE_RULES.filter(rule => rule.pattern.test(source)).map(rule => ({
    category: rule.category,
    severity: rule.severity,
    file_path: filePath,
    pattern: rule.pattern.source,
    description: rule.description,
  }));
}

function scanAccessControl(api: ApiImplementation): SecurityFinding[] {
  if (!api.authentication_required || GUARDED_ROUTE.test(api.source_code)) {
    return [];
  }

  return [
    {
      category: 'A01:2021-Broken Access Control',
      severity: 'high',
      file_path: api.file_path,
      pattern: GUARDED_ROUTE.source,
      description: `${api.method} ${api.path} requires authentication but the route has no guard`,
    },
  ];
}

function countSeverity(findings: SecurityFinding[], severity: Severity): number {
  return findings.filter(f => f.severity === severity).length;
}

export function scanImplementation(
  components: ComponentImplementation[],
  apis: ApiImplementation[]
): SecurityScan {
  const findings: SecurityFinding[] = [
    ...components.flatMap(c => scanSource(c.file_path, c.source_code)),
    ...apis.flatMap(a => [...scanAccessControl(a), ...scanSource(a.file_path, a.source_code)]),
  ];

  const critical = countSeverity(findings, 'critical');
  const high = countSeverity(findings, 'high');

  return {
    vulnerabilities: findings,
    critical_vulnerabilities: critical,
    high_vulnerabilities: high,
    medium_vulnerabilities: countSeverity(findings, 'medium'),
    security_compliance_met: critical === 0 && high === 0,
  };
}

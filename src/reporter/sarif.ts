import { Finding, ScanResult, Severity } from '../types.js';

const SARIF_SEVERITY: Record<Severity, string> = {
  [Severity.High]: 'error',
  [Severity.Medium]: 'warning',
  [Severity.Low]: 'note',
};

export const TOOL_VERSION = '0.1.0';

export function toSARIF(result: ScanResult) {
  const firstByRule = new Map<string, Finding>();
  for (const f of result.findings) {
    if (!firstByRule.has(f.rule)) firstByRule.set(f.rule, f);
  }

  return {
    $schema: 'https://raw.githubusercontent.com/oasis-tcs/sarif-spec/main/sarif-2.1/schema/sarif-schema-2.1.0.json',
    version: '2.1.0',
    runs: [
      {
        tool: {
          driver: {
            name: 'crashscan',
            version: TOOL_VERSION,
            rules: [...firstByRule.values()].map((finding) => ({
              id: finding.rule,
              shortDescription: { text: finding.issueType },
              help: { text: finding.suggestion },
              properties: { category: finding.category },
              defaultConfiguration: {
                level: SARIF_SEVERITY[finding.severity],
              },
            })),
          },
        },
        results: result.findings.map((f) => ({
          ruleId: f.rule,
          level: SARIF_SEVERITY[f.severity],
          message: { text: `${f.issueType}: ${f.detail}` },
          locations: [
            {
              physicalLocation: {
                artifactLocation: { uri: f.file },
                region: {
                  startLine: f.line,
                  snippet: { text: f.matchedCode },
                },
              },
            },
          ],
        })),
      },
    ],
  };
}

export function renderSARIF(result: ScanResult): string {
  return JSON.stringify(toSARIF(result), null, 2);
}

export function reportSARIF(result: ScanResult): void {
  console.log(renderSARIF(result));
}

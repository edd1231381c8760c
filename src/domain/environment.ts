/**
 * Target environments. Each selects the vendor API base and the public
 * base that serves uploaded PDFs.
 */

export type EnvironmentName = 'qa' | 'prod';

export interface EnvironmentConfig {
  name: EnvironmentName;
  apiBaseUrl: string;
  pdfBaseUrl: string;
}

export const ENVIRONMENTS: Record<EnvironmentName, EnvironmentConfig> = {
  qa: {
    name: 'qa',
    apiBaseUrl: 'https://beaconstacqa.mobstac.com/api/2.0',
    pdfBaseUrl: 'https://q.eddy.pro',
  },
  prod: {
    name: 'prod',
    apiBaseUrl: 'https://api.uniqode.com/api/2.0',
    pdfBaseUrl: 'https://eddy.pro',
  },
};

export const ENVIRONMENT_NAMES: readonly EnvironmentName[] = ['qa', 'prod'];

export function isEnvironmentName(value: string): value is EnvironmentName {
  return ENVIRONMENT_NAMES.some((name) => name === value);
}

/** Public URL the platform serves an uploaded PDF from. */
export function buildPdfUrl(environment: EnvironmentConfig, mediaId: number): string {
  return `${environment.pdfBaseUrl.replace(/\/+$/, '')}/pdf/${mediaId}`;
}

export function buildCitation(url: string): string {
  return `Source: UNHCR Refugee Population Statistics API (${url})`
}

// Name syntax checks for resource names, field names and versions. Each
// returns the list of violations; an empty list means the value is valid.

const DNS1123_LABEL_FMT = '[a-z0-9]([-a-z0-9]*[a-z0-9])?'
const DNS1123_SUBDOMAIN_FMT = `${DNS1123_LABEL_FMT}(\\.${DNS1123_LABEL_FMT})*`
const DNS1123_SUBDOMAIN_MAX_LENGTH = 253
const dns1123SubdomainRegexp = new RegExp(`^${DNS1123_SUBDOMAIN_FMT}$`)

const DNS1035_LABEL_FMT = '[a-z]([-a-z0-9]*[a-z0-9])?'
const DNS1035_LABEL_MAX_LENGTH = 63
const dns1035LabelRegexp = new RegExp(`^${DNS1035_LABEL_FMT}$`)

function maxLenError(length: number): string {
  return `must be no more than ${length} characters`
}

function disallowedCharacters(value: string, allowed: RegExp): string[] {
  const found: string[] = []
  for (const char of value) {
    if (!allowed.test(char) && !found.includes(char)) found.push(char)
  }
  return found
}

/** Lower-case RFC 1123 subdomain, as used for object names. */
export function isDNS1123Subdomain(value: string): string[] {
  const errs: string[] = []
  if (value.length > DNS1123_SUBDOMAIN_MAX_LENGTH) {
    errs.push(maxLenError(DNS1123_SUBDOMAIN_MAX_LENGTH))
  }
  if (!dns1123SubdomainRegexp.test(value)) {
    errs.push(
      "a lowercase RFC 1123 subdomain must consist of lower case alphanumeric characters, '-' or '.', " +
      "and must start and end with an alphanumeric character (e.g. 'example.com', regex used for validation is '" +
      DNS1123_SUBDOMAIN_FMT + "')",
    )
    const invalid = disallowedCharacters(value, /[a-z0-9.-]/)
    if (invalid.length > 0) {
      errs.push(`contains disallowed characters: ${invalid.map(c => `"${c}"`).join(', ')}`)
    }
  }
  return errs
}

/** RFC 1035 label, as used for plural names, categories and version names. */
export function isDNS1035Label(value: string): string[] {
  const errs: string[] = []
  if (value.length > DNS1035_LABEL_MAX_LENGTH) {
    errs.push(maxLenError(DNS1035_LABEL_MAX_LENGTH))
  }
  if (!dns1035LabelRegexp.test(value)) {
    errs.push(
      "a DNS-1035 label must consist of lower case alphanumeric characters or '-', start with an alphabetic character, " +
      "and end with an alphanumeric character (e.g. 'my-name', or 'abc-123', regex used for validation is '" +
      DNS1035_LABEL_FMT + "')",
    )
  }
  return errs
}

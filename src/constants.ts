export const MESSAGES = {
  title: 'debdeps 📦',
  loadingIndex: 'Loading package index...',
  indexLoaded: 'Package index loaded',
  indexFailed: 'Failed to load package index',
  packageNotFound: "package '{0}' not found in the index",
  noDependencies: '{0} has no dependencies within depth {1}',
  dependenciesOf: 'Dependencies of {0}:',
  error: 'Error:',
  fatalError: '\nFatal error:',
  signalCleanup: '\n{0} received, cleaning up...',
  unexpected: '\nUnexpected error:',
};

export const CLI_STRINGS = {
  CLI_NAME: 'debdeps',
  CLI_DESCRIPTION:
    'Build and display the dependency graph of a package from a Debian Packages index',
  EXAMPLE_TEXT: [
    '',
    'Examples:',
    '  $ debdeps -p curl --repo-url http://deb.debian.org/debian/dists/stable/main/binary-amd64/Packages.gz --ascii-tree simple',
    '  $ debdeps -p A --repo-path ./repo.txt --test-mode simulate --max-depth 3 --wbs',
  ].join('\n'),
} as const;

export const INDEX_FIELDS = {
  PACKAGE: 'Package:',
  DEPENDS: ['Pre-Depends:', 'Depends:'],
  ANY_ARCH_QUALIFIER: ':any',
} as const;

export const TEST_MODES = ['off', 'readonly', 'simulate'] as const;

export const ASCII_TREE_MODES = ['off', 'simple', 'detailed'] as const;

export const DEFAULTS = {
  MAX_DEPTH: 5,
  TEST_MODE: 'off',
  ASCII_TREE: 'off',
  FILTER: '',
} as const;

export const MAX_DEPTH_LIMIT = 100;

export const EXIT_CODES = {
  OK: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export const SOURCE_PATTERNS = {
  REPO_URL_REGEX:
    /^(?:http|ftp)s?:\/\/(?:(?:[A-Z0-9](?:[A-Z0-9-]{0,61}[A-Z0-9])?\.)+(?:[A-Z]{2,6}\.?|[A-Z0-9-]{2,}\.?)|[A-Z0-9-]+)(?::\d+)?(?:\/?|[/?]\S+)$/i,
  UNSUPPORTED_COMPRESSION_REGEX: /\.(xz|bz2|lzma|zst)$/i,
  GZIP_MAGIC: [0x1f, 0x8b],
} as const;

export function formatMessage(
  template: string,
  ...values: (string | number)[]
): string {
  return values.reduce<string>(
    (result, value, index) => result.replace(`{${index}}`, String(value)),
    template,
  );
}

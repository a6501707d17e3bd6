import * as cheerio from 'cheerio';
import type { InterestCategory } from '../types/scan.js';

// Content signatures: what we expect to find in legitimate files
const CONTENT_SIGNATURES: Array<{ pathPattern: RegExp; bodyPattern: RegExp; category: InterestCategory }> = [
  { pathPattern: /\.env/, bodyPattern: /^[A-Z_][A-Z0-9_]*=.+/m, category: 'credentials_file' },
  { pathPattern: /\.(key|pem|crt|cert|csr)$|private\.key/, bodyPattern: /-----BEGIN [A-Z ]+-----/, category: 'credentials_file' },
  { pathPattern: /\.git\/HEAD/, bodyPattern: /ref: refs\//, category: 'source_control' },
  { pathPattern: /\.git\/config/, bodyPattern: /\[core\]/, category: 'source_control' },
  { pathPattern: /\.svn\/entries/, bodyPattern: /^\d+/, category: 'source_control' },
  { pathPattern: /\.htpasswd/, bodyPattern: /^[^:]+:\$?[a-zA-Z0-9$./]+$/m, category: 'credentials_file' },
  { pathPattern: /\.htaccess/, bodyPattern: /(RewriteEngine|RewriteRule|Deny from|Require all|AuthType)/i, category: 'configuration_file' },
  { pathPattern: /web(\.debug)?\.config/, bodyPattern: /<configuration/i, category: 'configuration_file' },
  { pathPattern: /wp-config\.php/, bodyPattern: /(DB_NAME|DB_USER|DB_PASSWORD)/, category: 'configuration_file' },
  { pathPattern: /config\.php/, bodyPattern: /(database|password|host|user)/i, category: 'configuration_file' },
  { pathPattern: /composer\.json/, bodyPattern: /"require"/, category: 'configuration_file' },
  { pathPattern: /package\.json/, bodyPattern: /"(name|version|dependencies)"/, category: 'configuration_file' },
  { pathPattern: /\.npmrc/, bodyPattern: /(registry|token|auth)/i, category: 'credentials_file' },
  { pathPattern: /\.(sql|dump)(\.|$)/, bodyPattern: /(CREATE TABLE|INSERT INTO|DROP TABLE)/i, category: 'database_file' },
  { pathPattern: /\.php(\.|~|$)/, bodyPattern: /<\?php/, category: 'backup_file' },
  { pathPattern: /(error|access|debug)[._]log/, bodyPattern: /(\d{4}[-/]\d{2}[-/]\d{2}|PHP|Warning|Error|Notice)/i, category: 'log_file' },
  { pathPattern: /robots\.txt/, bodyPattern: /(User-agent|Disallow|Allow|Sitemap)/i, category: 'robots_sitemap' },
  { pathPattern: /sitemap.*\.xml/, bodyPattern: /<(urlset|sitemapindex)/, category: 'robots_sitemap' },
  { pathPattern: /swagger|openapi/, bodyPattern: /"swagger"|"openapi"/, category: 'server_info' },
];

// Soft-404 body indicators: phrases found on custom error pages
const SOFT_404_INDICATORS = [
  'not found',
  'page not found',
  'does not exist',
  'no longer available',
  'couldn\'t find',
  'could not find',
  'nothing here',
  'page is missing',
  'error 404',
  'we can\'t find',
  'this page doesn\'t',
  'resource not found',
  'file not found',
];

// Error pages are short; anything longer is treated as real content
const SOFT_404_MAX_TEXT = 600;

// Path-to-category mapping when no content signature matched
const PATH_CATEGORY_MAP: Array<{ pathPattern: RegExp; category: InterestCategory }> = [
  { pathPattern: /\.env|\.envrc|\.envs|\.environment/, category: 'credentials_file' },
  { pathPattern: /\.htpasswd|\.npmrc|accesstoken|credentials|secret|passwd|shadow/, category: 'credentials_file' },
  { pathPattern: /\.(key|pem|crt|cert|pfx|p12|jks|keystore|csr|rsa|dsa|gpg|pgp)$/, category: 'credentials_file' },
  { pathPattern: /\.git|\.svn|\.hg/, category: 'source_control' },
  { pathPattern: /\.(sql|sqlite|sqlite3|db|mdb|accdb|dbf|dump|mdf|ldf)(\.|$)|database/, category: 'database_file' },
  { pathPattern: /\.(zip|rar|tar|tgz|tbz2|txz|7z|gz|gzip|bz2|xz|lzma|z|ace|arj)$/, category: 'backup_file' },
  { pathPattern: /backup|\.bak|\.old|\.orig|\.save|\.swp|\.swo|~$|archive|dump/, category: 'backup_file' },
  { pathPattern: /\.log(\d)?$|error_log|access_log|log_all/, category: 'log_file' },
  { pathPattern: /config|configuration|settings|\.ini$|\.ya?ml$|\.toml$|\.htaccess|web\.config/, category: 'configuration_file' },
  { pathPattern: /admin|cpanel|phpmyadmin|adminer|dashboard|console|panel|manager/, category: 'admin_panel' },
  { pathPattern: /phpinfo|server-status|server-info|swagger|redoc|openapi|\.well-known/, category: 'server_info' },
  { pathPattern: /robots\.txt|sitemap/, category: 'robots_sitemap' },
  { pathPattern: /\/$/, category: 'sensitive_directory' },
];

export function categorize(path: string, sample: string): InterestCategory {
  const lowerPath = path.toLowerCase();

  if (sample.length > 0) {
    for (const sig of CONTENT_SIGNATURES) {
      if (sig.pathPattern.test(lowerPath) && sig.bodyPattern.test(sample)) {
        return sig.category;
      }
    }
  }

  for (const mapping of PATH_CATEGORY_MAP) {
    if (mapping.pathPattern.test(lowerPath)) {
      return mapping.category;
    }
  }
  return 'other';
}

export function isHtml(contentType: string | null): boolean {
  return contentType !== null && /text\/html|application\/xhtml/i.test(contentType);
}

export function visibleText(html: string): string {
  const $ = cheerio.load(html);
  $('script, style, noscript').remove();
  return $.root().text().replace(/\s+/g, ' ').trim();
}

/**
 * A short HTML page whose visible text says "not found" is a disguised error page,
 * whatever status it was served with.
 */
export function looksLikeSoft404(contentType: string | null, sample: string): boolean {
  if (!isHtml(contentType) || sample.length === 0) return false;

  const text = visibleText(sample).toLowerCase();
  if (text.length > SOFT_404_MAX_TEXT) return false;
  return SOFT_404_INDICATORS.some(indicator => text.includes(indicator));
}

// Random path that should not exist on any server, for baseline probing
export function generateBaselinePath(): string {
  const chars = 'abcdefghijklmnopqrstuvwxyz0123456789';
  let path = '';
  for (let i = 0; i < 16; i++) {
    path += chars[Math.floor(Math.random() * chars.length)];
  }
  return `${path}-not-a-real-path-${Date.now()}`;
}

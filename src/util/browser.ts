import execa from 'execa';

export interface OpenerCommand {
  file: string;
  args: string[];
}

export function openerFor(platform: NodeJS.Platform, url: string): OpenerCommand {
  switch (platform) {
    case 'darwin':
      return { file: 'open', args: [url] };
    case 'win32':
      // first quoted argument to start is the window title
      return { file: 'cmd', args: ['/c', 'start', '""', url] };
    default:
      return { file: 'xdg-open', args: [url] };
  }
}

/**
 * Hands the URL to the platform opener, which returns once the browser is launched.
 * Resolves to the failure message, or null on success.
 */
export async function openBrowser(url: string, platform: NodeJS.Platform = process.platform): Promise<string | null> {
  const opener = openerFor(platform, url);
  try {
    await execa(opener.file, opener.args, { stdio: 'ignore', timeout: 10_000 });
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

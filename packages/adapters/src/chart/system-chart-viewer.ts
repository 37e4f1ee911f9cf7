import { spawn } from 'child_process';
import type { ChartViewerPort } from '@rolling-stock/domain';

export function viewerCommand(platform: NodeJS.Platform, target: string): [string, string[]] {
  switch (platform) {
    case 'darwin':
      return ['open', [target]];
    case 'win32':
      return ['cmd', ['/c', 'start', '""', target]];
    default:
      return ['xdg-open', [target]];
  }
}

/** Opens charts with the platform's default viewer, detached from this process. */
export class SystemChartViewer implements ChartViewerPort {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  open(target: string): Promise<void> {
    const [command, args] = viewerCommand(this.platform, target);
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { detached: true, stdio: 'ignore' });
      child.once('error', reject);
      child.once('spawn', () => {
        child.unref();
        console.log(`[chart] opened ${target}`);
        resolve();
      });
    });
  }
}

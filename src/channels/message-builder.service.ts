import { Injectable } from '@nestjs/common';
import type { Alert, Channel } from '../db/types/index.js';
import type { ChannelMessage } from './types/channel.types.js';

const SEVERITY_LABEL: Record<Alert['severity'], string> = {
  low: 'Advice',
  moderate: 'Watch and Act',
  high: 'Warning',
  extreme: 'Emergency Warning',
};

function hazardLabel(hazardType: string): string {
  return hazardType
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part[0].toUpperCase() + part.slice(1))
    .join(' ');
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

@Injectable()
export class MessageBuilderService {
  build(alert: Alert, channel: Channel): ChannelMessage {
    const level = SEVERITY_LABEL[alert.severity];
    const hazard = hazardLabel(alert.hazardType);
    const subject = `[${level}] ${hazard} – ${alert.geographicRegion}`;
    const reported = alert.reportedAt.toISOString();

    if (channel === 'SMS') {
      const detail = alert.description ? ` ${alert.description}` : '';
      return {
        subject,
        text: `${level.toUpperCase()}: ${hazard} in ${alert.geographicRegion} (reported ${reported}).${detail}`,
      };
    }

    const lines = [
      `${level}: ${hazard} reported in ${alert.geographicRegion}.`,
      `Reported at: ${reported}`,
      `Source: ${alert.source}`,
    ];
    if (alert.description) lines.push('', alert.description);
    const text = lines.join('\n');
    const html = lines
      .map((line) => (line ? `<p>${escapeHtml(line)}</p>` : ''))
      .join('');
    return { subject, text, html };
  }
}

import PDFDocument from 'pdfkit';
import { EventBranding } from '../config/env';
import { TicketRecord } from '../types/entry-pass.types';
import { truncate } from '../utils/identifiers';
import { createLogger } from '../utils/logger';

const log = createLogger('ticket-pdf');

const PALETTE = {
  dark: '#2a2a2a',
  medium: '#5a5a5a',
  light: '#9a9a9a',
  veryLight: '#d0d0d0',
  pageBackground: '#e8e8e8',
  panel: '#f2f2f2',
  dots: '#f8f8f8',
  accent: '#6366f1',
  white: '#ffffff',
};

const FONT = 'Courier';
const FONT_BOLD = 'Courier-Bold';

export const FOOTER_TEXT = 'This ticket is valid for one-time entry only. QR code will be scanned at the gate.';

export interface PassField {
  label: string;
  value: string;
}

/**
 * The labelled values printed on the left half of the pass, in order.
 */
export function passFields(ticket: TicketRecord, event: EventBranding): PassField[] {
  const fields: PassField[] = [
    { label: 'TEAM NAME', value: truncate(ticket.teamName, 35) },
    { label: 'TEAM CODE (For Manual Entry)', value: ticket.teamCode },
    { label: 'COLLEGE', value: truncate(ticket.collegeName, 28) },
    { label: 'TEAM SIZE', value: `${ticket.teamSize} Members` },
    { label: 'TEAM LEADER EMAIL', value: truncate(ticket.teamLeaderEmail, 40) },
    { label: 'EVENT SCHEDULE', value: ticket.slot || event.schedule },
  ];
  if (event.sponsors) {
    fields.push({ label: 'SPONSORS', value: event.sponsors });
  }
  return fields;
}

/**
 * Renders the half-page landscape entry pass: details on the left, the QR
 * code in a grey scan panel on the right.
 */
export class TicketPdfService {
  constructor(private readonly event: EventBranding) {}

  render(ticket: TicketRecord, qrPng: Buffer): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const doc = new PDFDocument({
        size: 'A4',
        layout: 'landscape',
        margin: 0,
        info: {
          Title: `${ticket.eventName} Entry Pass ${ticket.ticketId}`,
          Subject: ticket.teamName,
        },
      });

      const chunks: Buffer[] = [];
      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => {
        log.info({ ticketId: ticket.ticketId }, 'Ticket PDF generated');
        resolve(Buffer.concat(chunks));
      });
      doc.on('error', reject);

      try {
        this.draw(doc, ticket, qrPng);
        doc.end();
      } catch (error) {
        log.error({ err: error, ticketId: ticket.ticketId }, 'Failed to generate ticket PDF');
        reject(error);
      }
    });
  }

  private draw(doc: PDFKit.PDFDocument, ticket: TicketRecord, qrPng: Buffer): void {
    const pageWidth = doc.page.width;
    const pageHeight = doc.page.height;

    const ticketWidth = pageWidth * 0.85;
    const ticketHeight = pageHeight * 0.5;
    const ticketX = (pageWidth - ticketWidth) / 2;
    const ticketY = (pageHeight - ticketHeight) / 2;

    const leftWidth = ticketWidth * 0.65;
    const rightWidth = ticketWidth * 0.35;
    const leftX = ticketX + 20;
    const rightX = ticketX + leftWidth;

    // Page and card
    doc.rect(0, 0, pageWidth, pageHeight).fill(PALETTE.pageBackground);
    doc.rect(ticketX, ticketY, ticketWidth, ticketHeight).fill(PALETTE.white);

    doc.fillColor(PALETTE.dots);
    for (let x = ticketX; x < ticketX + ticketWidth; x += 12) {
      for (let y = ticketY; y < ticketY + ticketHeight; y += 12) {
        doc.circle(x, y, 0.8).fill();
      }
    }

    doc.rect(ticketX, ticketY, 3, ticketHeight).fill(PALETTE.dark);
    doc.lineWidth(0.5).rect(ticketX, ticketY, ticketWidth, ticketHeight).stroke(PALETTE.veryLight);

    doc
      .moveTo(rightX, ticketY + 10)
      .lineTo(rightX, ticketY + ticketHeight - 10)
      .dash(3, { space: 2 })
      .stroke(PALETTE.veryLight)
      .undash();

    // Left: event heading
    let y = ticketY + 18;
    doc.font(FONT_BOLD).fontSize(18).fillColor(PALETTE.dark).text(ticket.eventName, leftX, y, { lineBreak: false });
    const glyphX = leftX + doc.widthOfString(ticket.eventName) + 12;
    doc.font(FONT).fontSize(12).fillColor(PALETTE.light).text('</>', glyphX, y + 2, { lineBreak: false });

    y += 24;
    doc.font(FONT).fontSize(9).fillColor(PALETTE.medium).text(this.event.tagline, leftX, y, { lineBreak: false });
    if (this.event.host) {
      y += 11;
      doc.font(FONT).fontSize(7).fillColor(PALETTE.light).text(this.event.host, leftX, y, { lineBreak: false });
    }

    y += 14;
    doc.font(FONT_BOLD).fontSize(7).fillColor(PALETTE.light).text('ENTRY PASS', leftX, y, { lineBreak: false });

    y += 12;
    doc.lineWidth(0.5).moveTo(leftX, y).lineTo(rightX - 20, y).stroke(PALETTE.veryLight);

    // Left: participant details
    y += 8;
    for (const field of passFields(ticket, this.event)) {
      const prominent = field.label.startsWith('TEAM CODE');
      doc.font(FONT).fontSize(6).fillColor(PALETTE.light).text(field.label, leftX, y, { lineBreak: false });
      y += 8;
      doc
        .font(prominent || field.label === 'TEAM NAME' ? FONT_BOLD : FONT)
        .fontSize(prominent ? 14 : 9)
        .fillColor(prominent ? PALETTE.accent : PALETTE.dark)
        .text(field.value, leftX, y, { lineBreak: false });
      y += prominent ? 22 : 16;
    }

    // Right: scan panel
    const centerX = rightX + rightWidth / 2;
    const panelWidth = rightWidth - 10;
    doc.rect(rightX + 5, ticketY + 5, panelWidth, ticketHeight - 10).fill(PALETTE.panel);

    doc
      .font(FONT_BOLD)
      .fontSize(7)
      .fillColor(PALETTE.medium)
      .text('SCAN AT ENTRY', rightX + 5, ticketY + 22, { width: panelWidth, align: 'center', lineBreak: false });

    const qrSize = 110;
    const qrX = centerX - qrSize / 2;
    const qrY = ticketY + ticketHeight / 2 - qrSize / 2;
    doc.rect(qrX - 5, qrY - 5, qrSize + 10, qrSize + 10).fill(PALETTE.white);
    doc.lineWidth(0.5).rect(qrX - 5, qrY - 5, qrSize + 10, qrSize + 10).stroke(PALETTE.veryLight);
    doc.image(qrPng, qrX, qrY, { width: qrSize, height: qrSize });

    const belowQr = qrY + qrSize + 12;
    doc
      .font(FONT)
      .fontSize(6)
      .fillColor(PALETTE.light)
      .text('TICKET ID', rightX + 5, belowQr, { width: panelWidth, align: 'center', lineBreak: false });
    doc
      .font(FONT_BOLD)
      .fontSize(10)
      .fillColor(PALETTE.dark)
      .text(ticket.ticketId, rightX + 5, belowQr + 9, { width: panelWidth, align: 'center', lineBreak: false });

    // Footer
    doc
      .font(FONT)
      .fontSize(6)
      .fillColor(PALETTE.light)
      .text(FOOTER_TEXT, 0, ticketY + ticketHeight + 8, { width: pageWidth, align: 'center', lineBreak: false });
  }
}

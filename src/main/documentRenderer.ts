/**
 * Document Renderer
 *
 * Writes tailored sections to PDF (pdfkit), DOCX (docx), Markdown or plain
 * text, chosen by the target's extension. When PDF or DOCX rendering fails a
 * plain-text file is written beside the target instead.
 */

import * as fs from 'fs';
import * as path from 'path';
import PDFDocument from 'pdfkit';
import { Document, HeadingLevel, Packer, Paragraph, TextRun } from 'docx';
import { loggers, serializeError } from '../shared/logging/logger';
import type { DocumentRenderer, EntryInput, ResumeSections } from '../tailor/types';

const log = loggers.documents;

type BodySection = 'summary' | 'skills' | 'experience' | 'education' | 'projects' | 'certifications';

const SECTION_TITLES: ReadonlyArray<[BodySection, string]> = [
  ['summary', 'Summary'],
  ['skills', 'Skills'],
  ['experience', 'Experience'],
  ['education', 'Education'],
  ['projects', 'Projects'],
  ['certifications', 'Certifications']
];

/**
 * One line per entry: flat strings as given, structured entries as
 * "anchor (dates): description"
 */
export function formatEntry(input: EntryInput): string {
  if (typeof input === 'string') {
    return input;
  }
  const head = input.dates ? `${input.anchor} (${input.dates})` : input.anchor;
  return input.description ? `${head}: ${input.description}` : head;
}

function sectionBody(sections: ResumeSections, section: BodySection): string[] {
  switch (section) {
    case 'summary':
      return sections.summary?.trim() ? [sections.summary.trim()] : [];
    case 'skills':
      return sections.skills && sections.skills.length > 0 ? [sections.skills.join(', ')] : [];
    case 'experience':
    case 'projects':
      return (sections[section] ?? []).map(entry => `- ${formatEntry(entry)}`);
    case 'education':
    case 'certifications':
      return (sections[section] ?? []).map(item => `- ${item}`);
  }
}

/**
 * Markdown rendering: "# Name", "## Section", bullets for list sections
 */
export function renderMarkdown(sections: ResumeSections): string {
  const lines: string[] = [];
  if (sections.name?.trim()) {
    lines.push(`# ${sections.name.trim()}`, '');
  }
  for (const [section, title] of SECTION_TITLES) {
    const body = sectionBody(sections, section);
    if (body.length === 0) continue;
    lines.push(`## ${title}`, ...body, '');
  }
  return `${lines.join('\n').trimEnd()}\n`;
}

/**
 * Plain-text rendering with upper-case section titles
 */
export function renderText(sections: ResumeSections): string {
  const lines: string[] = [];
  if (sections.name?.trim()) {
    lines.push(sections.name.trim(), '');
  }
  for (const [section, title] of SECTION_TITLES) {
    const body = sectionBody(sections, section);
    if (body.length === 0) continue;
    lines.push(title.toUpperCase(), ...body, '');
  }
  return `${lines.join('\n').trimEnd()}\n`;
}

/**
 * Path of the plain-text fallback written beside `targetPath`
 */
export function fallbackPath(targetPath: string): string {
  const parsed = path.parse(targetPath);
  return path.join(parsed.dir, `${parsed.name}.txt`);
}

export class ResumeDocumentRenderer implements DocumentRenderer {
  async render(sections: ResumeSections, targetPath: string): Promise<string> {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });
    const ext = path.extname(targetPath).toLowerCase();

    if (ext === '.pdf' || ext === '.docx') {
      try {
        if (ext === '.pdf') {
          await this.writePdf(sections, targetPath);
        } else {
          await this.writeDocx(sections, targetPath);
        }
        log.info({ targetPath }, 'Rendered resume');
        return targetPath;
      } catch (error) {
        const textPath = fallbackPath(targetPath);
        log.warn({ err: serializeError(error), targetPath, textPath }, 'Rich rendering failed, writing plain text');
        await fs.promises.rm(targetPath, { force: true });
        await fs.promises.writeFile(textPath, renderText(sections), 'utf-8');
        return textPath;
      }
    }

    const content = ext === '.md' ? renderMarkdown(sections) : renderText(sections);
    await fs.promises.writeFile(targetPath, content, 'utf-8');
    log.info({ targetPath }, 'Rendered resume');
    return targetPath;
  }

  protected async writePdf(sections: ResumeSections, targetPath: string): Promise<void> {
    const doc = new PDFDocument({ margin: 50, size: 'LETTER' });
    const writeStream = fs.createWriteStream(targetPath);
    doc.pipe(writeStream);

    try {
      this.drawPdf(doc, sections);
    } catch (error) {
      doc.unpipe(writeStream);
      await new Promise<void>(resolve => {
        writeStream.once('close', resolve);
        writeStream.on('error', streamError => {
          log.debug({ err: serializeError(streamError), targetPath }, 'PDF stream closed with error');
        });
        writeStream.destroy();
      });
      throw error;
    }

    const finished = new Promise<void>((resolve, reject) => {
      writeStream.on('finish', resolve);
      writeStream.on('error', reject);
    });
    doc.end();
    await finished;
  }

  protected drawPdf(doc: PDFKit.PDFDocument, sections: ResumeSections): void {
    for (const line of renderMarkdown(sections).split('\n')) {
      if (line.startsWith('# ')) {
        doc.fontSize(22).font('Helvetica-Bold').text(line.substring(2));
        doc.moveDown(0.5);
      } else if (line.startsWith('## ')) {
        doc.fontSize(14).font('Helvetica-Bold').text(line.substring(3).toUpperCase());
        doc.moveDown(0.2);
      } else if (line.startsWith('- ')) {
        doc.fontSize(11).font('Helvetica').text('• ' + line.substring(2), { indent: 20 });
      } else if (line.trim() === '') {
        doc.moveDown(0.5);
      } else {
        doc.fontSize(11).font('Helvetica').text(line);
      }
    }
  }

  protected async writeDocx(sections: ResumeSections, targetPath: string): Promise<void> {
    const children: Paragraph[] = [];

    for (const line of renderMarkdown(sections).split('\n')) {
      if (line.startsWith('# ')) {
        children.push(new Paragraph({
          text: line.substring(2),
          heading: HeadingLevel.HEADING_1,
          spacing: { after: 200 }
        }));
      } else if (line.startsWith('## ')) {
        children.push(new Paragraph({
          text: line.substring(3),
          heading: HeadingLevel.HEADING_2,
          spacing: { after: 150 }
        }));
      } else if (line.startsWith('- ')) {
        children.push(new Paragraph({
          children: [new TextRun(line.substring(2))],
          bullet: { level: 0 },
          spacing: { after: 50 }
        }));
      } else if (line.trim() === '') {
        children.push(new Paragraph({ text: '', spacing: { after: 100 } }));
      } else {
        children.push(new Paragraph({
          children: [new TextRun(line)],
          spacing: { after: 50 }
        }));
      }
    }

    const doc = new Document({
      sections: [{
        properties: {},
        children
      }]
    });

    const buffer = await Packer.toBuffer(doc);
    await fs.promises.writeFile(targetPath, buffer);
  }
}

export const documentRenderer = new ResumeDocumentRenderer();

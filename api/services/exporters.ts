import { Document, HeadingLevel, Packer, Paragraph, TextRun } from 'docx';
import type { Annotation } from '../../src/types/annotations';
import type { AnnotationStore } from './annotationStore';
import type { DocumentStore } from './documentStore';
import { NotFoundError } from './errors';
import type { Namespace } from './namespaces';

export const ANNOTATION_COLOR = 'C80000';

export function formatAnnotationLine(annotation: Annotation) {
  return `[${annotation.label}] ${annotation.text} (Rank=${annotation.rank ?? ''})`;
}

export function exportFilename(docId: string, extension: 'json' | 'docx') {
  return `${docId}_annotations.${extension}`;
}

/**
 * Renders stored annotations as downloadable artifacts. Read-only.
 */
export class AnnotationExporter {
  constructor(
    private readonly documents: DocumentStore,
    private readonly annotations: AnnotationStore,
  ) {}

  async toJson(namespace: Namespace, docId: string): Promise<string> {
    const list = await this.annotations.list(namespace, docId);
    return JSON.stringify(list, null, 2);
  }

  async toWord(namespace: Namespace, docId: string): Promise<Buffer> {
    if (!(await this.documents.has(namespace, docId))) {
      throw new NotFoundError(`Document "${docId}" not found`);
    }
    const list = await this.annotations.list(namespace, docId);

    const document = new Document({
      sections: [
        {
          children: [
            new Paragraph({ text: `Annotations for ${docId}`, heading: HeadingLevel.HEADING_1 }),
            ...list.map(
              (annotation) =>
                new Paragraph({
                  children: [new TextRun({ text: formatAnnotationLine(annotation), color: ANNOTATION_COLOR })],
                }),
            ),
          ],
        },
      ],
    });
    return Packer.toBuffer(document);
  }
}

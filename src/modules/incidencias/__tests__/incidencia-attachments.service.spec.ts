import { HistoryAction } from '../../../database/entities/incidencia-history.entity';
import {
  IncidenciaNotFoundException,
  InvalidInputException,
} from '../exceptions/incidencia.exceptions';
import { IncidenciaAttachmentsService } from '../services/incidencia-attachments.service';
import {
  ADMIN,
  OTHER_STUDENT,
  STUDENT,
  IncidenciasTestContext,
  createIncidenciasTestContext,
} from './incidencias-test-context';

describe('IncidenciaAttachmentsService', () => {
  let ctx: IncidenciasTestContext;
  let attachmentsService: IncidenciaAttachmentsService;
  let incidenciaId: number;

  beforeEach(async () => {
    ctx = await createIncidenciasTestContext();
    attachmentsService = ctx.attachmentsService;
    ({ id: incidenciaId } = await ctx.incidenciasService.create(STUDENT, {
      title: 'Broken window',
      description: 'Second floor corridor',
    }));
  });

  it('should register attachment metadata and record it', async () => {
    const attachment = await attachmentsService.addAttachment(STUDENT, incidenciaId, {
      filename: 'window.png',
      mimeType: 'image/png',
      sizeBytes: 2048,
      storagePath: 'uploads/2024/window.png',
    });

    expect(attachment).toMatchObject({
      id: 1,
      incidenciaId,
      filename: 'window.png',
      mimeType: 'image/png',
      sizeBytes: 2048,
      storagePath: 'uploads/2024/window.png',
      uploaderId: 's1',
    });

    const history = await ctx.historyService.listForIncidencia(incidenciaId);
    expect(history[1]).toMatchObject({
      action: HistoryAction.ATTACHMENT_ADDED,
      after: { attachmentId: 1, filename: 'window.png' },
      description: 'Attachment window.png added',
    });
  });

  it('should default optional metadata to null', async () => {
    const attachment = await attachmentsService.addAttachment(ADMIN, incidenciaId, {
      filename: 'report.pdf',
      storagePath: 'uploads/report.pdf',
    });

    expect(attachment.mimeType).toBeNull();
    expect(attachment.sizeBytes).toBeNull();
    expect(attachment.uploaderId).toBe('admin1');
  });

  it('should reject a blank storage path', async () => {
    await expect(
      attachmentsService.addAttachment(STUDENT, incidenciaId, {
        filename: 'window.png',
        storagePath: '   ',
      }),
    ).rejects.toThrow(InvalidInputException);
  });

  it('should hide the ticket from other reporters', async () => {
    await expect(
      attachmentsService.addAttachment(OTHER_STUDENT, incidenciaId, {
        filename: 'window.png',
        storagePath: 'uploads/window.png',
      }),
    ).rejects.toThrow(IncidenciaNotFoundException);
    await expect(
      attachmentsService.listAttachments(OTHER_STUDENT, incidenciaId),
    ).rejects.toThrow(IncidenciaNotFoundException);
  });

  it('should list attachments in upload order', async () => {
    await attachmentsService.addAttachment(STUDENT, incidenciaId, {
      filename: 'a.png',
      storagePath: 'uploads/a.png',
    });
    await attachmentsService.addAttachment(ADMIN, incidenciaId, {
      filename: 'b.png',
      storagePath: 'uploads/b.png',
    });

    const attachments = await attachmentsService.listAttachments(STUDENT, incidenciaId);

    expect(attachments.map((attachment) => attachment.filename)).toEqual([
      'a.png',
      'b.png',
    ]);
  });
});

import { z } from 'zod';

const emailAddress = z.object({
  emailAddress: z
    .object({
      name: z.string().nullish(),
      address: z.string().nullish(),
    })
    .nullish(),
});

export const graphErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export const folderSchema = z.object({
  id: z.string(),
  displayName: z.string(),
  totalItemCount: z.number().default(0),
  unreadItemCount: z.number().default(0),
});

export const folderPageSchema = z.object({
  value: z.array(folderSchema),
  '@odata.nextLink': z.string().optional(),
});

export const messageSchema = z.object({
  id: z.string(),
  subject: z.string().nullish(),
  from: emailAddress.nullish(),
  toRecipients: z.array(emailAddress).nullish(),
  ccRecipients: z.array(emailAddress).nullish(),
  receivedDateTime: z.string().nullish(),
  isRead: z.boolean().nullish(),
  hasAttachments: z.boolean().nullish(),
  body: z
    .object({
      contentType: z.string(),
      content: z.string().nullish(),
    })
    .nullish(),
});

export const messagePageSchema = z.object({
  value: z.array(messageSchema),
  '@odata.nextLink': z.string().optional(),
});

export const attachmentInfoSchema = z.object({
  id: z.string(),
  name: z.string().nullish(),
  size: z.number().default(0),
  contentType: z.string().nullish(),
  isInline: z.boolean().default(false),
});

export const messageDetailSchema = messageSchema.extend({
  attachments: z.array(attachmentInfoSchema).optional(),
});

export const fileAttachmentSchema = attachmentInfoSchema.extend({
  contentBytes: z.string(),
});

export const createdSchema = z.object({ id: z.string() });

export const tokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string().optional(),
  expires_in: z.coerce.number(),
});

export const tokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export type GraphMessage = z.infer<typeof messageSchema>;
export type GraphRecipient = z.infer<typeof emailAddress>;

import { z } from 'zod';

export const documentMetadataSchema = z
    .object({
        title: z.string().optional(),
        authors: z.array(z.string()).optional(),
        categories: z.array(z.string()).optional(),
        published: z.string().optional(),
    })
    .strip();

import { z } from 'zod';

const questionText = z
    .string({ required_error: 'Query is required' })
    .trim()
    .min(1, 'Query must not be blank')
    .max(2000, 'Query must be at most 2000 characters');

export const answersQuerySchema = z.object({
    query: questionText,
});

export const searchQuerySchema = z.object({
    query: questionText,
    maxResults: z.coerce.number().int().min(1).max(20).default(5),
});

export type AnswersQuery = z.infer<typeof answersQuerySchema>;
export type SearchQuery = z.infer<typeof searchQuerySchema>;

export const qaSchemas = {
    answers: {
        query: answersQuerySchema,
    },
    search: {
        query: searchQuerySchema,
    },
};

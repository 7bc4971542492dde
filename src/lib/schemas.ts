import { z } from 'zod';

// ======================
// TRELLO
// ======================

export const TrelloLabel = z.object({
    id: z.string().optional(),
    name: z.string().default(''),
});

export const TrelloCard = z.object({
    id: z.string(),
    name: z.string(),
    desc: z.string().default(''),
    due: z.string().nullish(),
    idList: z.string(),
    idMembers: z.array(z.string()).default([]),
    labels: z.array(TrelloLabel).default([]),
    pos: z.number().default(0),
    shortUrl: z.string().default(''),
});
export type TrelloCard = z.infer<typeof TrelloCard>;

export const TrelloAction = z.object({
    id: z.string().optional(),
    type: z.string(),
    date: z.string().default(''),
    idMemberCreator: z.string().default(''),
    data: z.object({
        text: z.string().optional(),
    }).default({}),
    memberCreator: z.object({
        id: z.string(),
        fullName: z.string().default(''),
    }).optional(),
});
export type TrelloAction = z.infer<typeof TrelloAction>;

export const TrelloCheckItem = z.object({
    name: z.string(),
    state: z.string().default('incomplete'),
});

export const TrelloChecklist = z.object({
    name: z.string(),
    checkItems: z.array(TrelloCheckItem).default([]),
});
export type TrelloChecklist = z.infer<typeof TrelloChecklist>;

export const TrelloAttachment = z.object({
    id: z.string().optional(),
    name: z.string(),
    url: z.string(),
});
export type TrelloAttachment = z.infer<typeof TrelloAttachment>;

export const TrelloMember = z.object({
    id: z.string(),
    fullName: z.string().default(''),
    username: z.string().default(''),
});
export type TrelloMember = z.infer<typeof TrelloMember>;

// ======================
// DROPBOX
// ======================

export const DropboxFileMetadata = z.object({
    path_display: z.string(),
    path_lower: z.string().optional(),
});
export type DropboxFileMetadata = z.infer<typeof DropboxFileMetadata>;

export const DropboxSharedLink = z.object({
    url: z.string(),
    path_lower: z.string().default(''),
    expires: z.string().optional(),
});
export type DropboxSharedLink = z.infer<typeof DropboxSharedLink>;

export const DropboxSharedLinkList = z.object({
    links: z.array(DropboxSharedLink).default([]),
});

export const DropboxAccount = z.object({
    account_id: z.string(),
    email: z.string().optional(),
});

// ======================
// CLUBHOUSE
// ======================

export const ClubhouseStorySummary = z.object({
    id: z.number(),
    name: z.string(),
    app_url: z.string().optional(),
});
export type ClubhouseStorySummary = z.infer<typeof ClubhouseStorySummary>;

export const ClubhouseProject = z.object({
    id: z.number(),
    name: z.string(),
});
export type ClubhouseProject = z.infer<typeof ClubhouseProject>;

export const ClubhouseWorkflow = z.object({
    id: z.number(),
    name: z.string(),
    states: z.array(z.object({
        id: z.number(),
        name: z.string(),
    })).default([]),
});
export type ClubhouseWorkflow = z.infer<typeof ClubhouseWorkflow>;

export const ClubhouseMember = z.object({
    id: z.string(),
    profile: z.object({
        name: z.string().default(''),
        mention_name: z.string().default(''),
    }).default({}),
});
export type ClubhouseMember = z.infer<typeof ClubhouseMember>;

export const ClubhouseLinkedFile = z.object({
    id: z.number(),
    name: z.string().optional(),
});
export type ClubhouseLinkedFile = z.infer<typeof ClubhouseLinkedFile>;

// ======================
// INTERMEDIATE DOCUMENT
// ======================

export const CommentDocument = z.object({
    text: z.string(),
    id_creator: z.string().default(''),
    creator_name: z.string().default(''),
    created_at: z.string().nullable().default(null),
});
export type CommentDocument = z.infer<typeof CommentDocument>;

export const TaskDocument = z.object({
    completed: z.boolean(),
    description: z.string(),
});

export const CardDocument = z.object({
    name: z.string(),
    desc: z.string().default(''),
    labels: z.array(z.string()).default([]),
    due_date: z.string().nullable().default(null),
    id_creator: z.string().default(''),
    id_owners: z.array(z.string()).default([]),
    created_at: z.string().nullable().default(null),
    comments: z.array(CommentDocument).default([]),
    checklists: z.array(TaskDocument).default([]),
    position: z.number().default(0),
    url: z.string(),
    attachments: z.record(z.string()).default({}),
});
export type CardDocument = z.infer<typeof CardDocument>;

export const CardDocumentList = z.array(CardDocument);

export const UserMapDocument = z.record(z.string());

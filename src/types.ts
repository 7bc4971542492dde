import {
    TrelloCard,
    TrelloAction,
    TrelloChecklist,
    TrelloAttachment,
    DropboxFileMetadata,
    DropboxSharedLink,
    ClubhouseStorySummary,
    ClubhouseProject,
    ClubhouseWorkflow,
    ClubhouseMember,
    ClubhouseLinkedFile,
} from './lib/schemas';
import { StoryType } from './config';

// ======================
// INTERMEDIATE MODEL
// ======================

export interface Task {
    completed: boolean;
    description: string;
}

export interface Comment {
    text: string;
    authorSourceId: string;
    authorDisplayName: string;
    createdAt?: Date;
}

export interface Card {
    name: string;
    description: string;
    labels: string[];
    dueDate?: Date;
    creatorId: string;
    ownerIds: string[];
    createdAt?: Date;
    comments: Comment[];
    tasks: Task[];
    position: number;
    sourceUrl: string;
    attachments: Record<string, string>;
}

export interface ShareLink {
    url: string;
    canonicalPath: string;
    expires?: Date;
}

// ======================
// COLLABORATORS
// ======================

export interface SourceApi {
    listCards(boardId: string, listIds?: string[]): Promise<TrelloCard[]>;
    getActions(cardId: string): Promise<TrelloAction[]>;
    getChecklists(cardId: string): Promise<TrelloChecklist[]>;
    getAttachments(cardId: string): Promise<TrelloAttachment[]>;
    downloadAttachment(url: string): Promise<Buffer>;
}

export interface UploadInput {
    path: string;
    content: Buffer;
    mode: 'add' | 'overwrite';
    autorename: boolean;
    mute: boolean;
    clientModified: string;
}

export interface SharingApi {
    upload(input: UploadInput): Promise<DropboxFileMetadata>;
    listSharedLinks(path: string): Promise<DropboxSharedLink[]>;
    createSharedLink(path: string): Promise<DropboxSharedLink>;
}

export interface CreateLabel {
    name: string;
}

export interface CreateTask {
    complete: boolean;
    description: string;
}

export interface CreateComment {
    text: string;
    author_id?: string;
    created_at?: string;
}

export interface CreateStory {
    name: string;
    description: string;
    project_id: number;
    workflow_state_id: number;
    story_type: StoryType;
    requested_by_id?: string;
    owner_ids: string[];
    follower_ids: string[];
    file_ids: number[];
    linked_file_ids: number[];
    labels: CreateLabel[];
    tasks: CreateTask[];
    comments: CreateComment[];
    deadline?: string;
    created_at?: string;
}

export interface CreateLinkedFile {
    name: string;
    type: 'dropbox';
    url: string;
    uploader_id: string;
}

export interface DestinationApi {
    listStories(projectId: number): Promise<ClubhouseStorySummary[]>;
    deleteStory(storyId: number): Promise<void>;
    createStory(story: CreateStory): Promise<ClubhouseStorySummary>;
    createLinkedFile(file: CreateLinkedFile): Promise<ClubhouseLinkedFile>;
    getProject(projectId: number): Promise<ClubhouseProject>;
    listWorkflows(): Promise<ClubhouseWorkflow[]>;
    getMember(memberId: string): Promise<ClubhouseMember>;
}

// ======================
// RESULTS
// ======================

export enum ImportErrorCode {
    DESTINATION_API_ERROR = 'DESTINATION_API_ERROR',
    INVALID_CARD = 'INVALID_CARD'
}

export type ImportStatus = 'success' | 'failed';

export interface ImportResult {
    status: ImportStatus;
    cardName: string;
    cardUrl: string;
    storyId?: number;
    errorCode?: ImportErrorCode;
    message?: string;
    deletedStoryIds: number[];
    failedLinkedFiles: string[];
    statusLine: string;
}

export interface ImportReport {
    summary: {
        total: number;
        succeeded: number;
        failed: number;
        deleted: number;
    };
    finishedAt: string;
    results: ImportResult[];
}

export type RelocationStage = 'download' | 'upload' | 'share';

export interface RelocationFailure {
    attachment: string;
    stage: RelocationStage;
    message: string;
}

export interface RelocationResult {
    links: Record<string, string>;
    failures: RelocationFailure[];
}

export interface ImportTarget {
    project: ClubhouseProject;
    workflowStateId: number;
    storyType: StoryType;
    importMember: ClubhouseMember;
    addCommentWithTrelloLink: boolean;
}

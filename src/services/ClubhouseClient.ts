import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { CreateLinkedFile, CreateStory, DestinationApi } from '../types';
import {
    ClubhouseLinkedFile,
    ClubhouseMember,
    ClubhouseProject,
    ClubhouseStorySummary,
    ClubhouseWorkflow,
} from '../lib/schemas';

export interface ClubhouseClientOptions {
    baseUrl: string;
    token: string;
    timeoutMs?: number;
    adapter?: AxiosAdapter;
}

export class ClubhouseClient implements DestinationApi {
    private client: AxiosInstance;

    constructor(options: ClubhouseClientOptions) {
        if (!options.token) {
            throw new Error('Clubhouse configuration missing. Set CLUBHOUSE_API_TOKEN in .env.');
        }

        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            adapter: options.adapter,
            headers: {
                'Content-Type': 'application/json',
                'Clubhouse-Token': options.token,
            },
        });
    }

    async validateConnection(): Promise<boolean> {
        try {
            await this.client.get('/member');
            return true;
        } catch (error) {
            console.error('Failed to connect to Clubhouse:', error);
            return false;
        }
    }

    async listStories(projectId: number): Promise<ClubhouseStorySummary[]> {
        try {
            const response = await this.client.get(`/projects/${projectId}/stories`);
            return z.array(ClubhouseStorySummary).parse(response.data);
        } catch (error) {
            console.error(`Error fetching stories for project ${projectId}:`, error);
            throw error;
        }
    }

    async deleteStory(storyId: number): Promise<void> {
        await this.client.delete(`/stories/${storyId}`);
    }

    async createStory(story: CreateStory): Promise<ClubhouseStorySummary> {
        const response = await this.client.post('/stories', story);
        return ClubhouseStorySummary.parse(response.data);
    }

    async createLinkedFile(file: CreateLinkedFile): Promise<ClubhouseLinkedFile> {
        const response = await this.client.post('/linked-files', file);
        return ClubhouseLinkedFile.parse(response.data);
    }

    async getProject(projectId: number): Promise<ClubhouseProject> {
        const response = await this.client.get(`/projects/${projectId}`);
        return ClubhouseProject.parse(response.data);
    }

    async listWorkflows(): Promise<ClubhouseWorkflow[]> {
        const response = await this.client.get('/workflows');
        return z.array(ClubhouseWorkflow).parse(response.data);
    }

    async getMember(memberId: string): Promise<ClubhouseMember> {
        const response = await this.client.get(`/members/${memberId}`);
        return ClubhouseMember.parse(response.data);
    }
}

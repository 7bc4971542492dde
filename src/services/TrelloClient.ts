import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { SourceApi } from '../types';
import {
    TrelloCard,
    TrelloAction,
    TrelloChecklist,
    TrelloAttachment,
    TrelloMember,
} from '../lib/schemas';

export interface TrelloClientOptions {
    baseUrl: string;
    apiKey: string;
    token: string;
    timeoutMs?: number;
    adapter?: AxiosAdapter;
}

const CARD_FIELDS = 'id,name,desc,due,idList,idMembers,labels,pos,shortUrl';
const TRELLO_HOST = 'trello.com';

export function isTrelloHost(url: string): boolean {
    let hostname: string;
    try {
        hostname = new URL(url).hostname.toLowerCase();
    } catch {
        return false;
    }
    return hostname === TRELLO_HOST || hostname.endsWith(`.${TRELLO_HOST}`);
}

export class TrelloClient implements SourceApi {
    private client: AxiosInstance;
    private apiKey: string;
    private token: string;

    constructor(options: TrelloClientOptions) {
        if (!options.apiKey || !options.token) {
            throw new Error('Trello configuration missing. Set TRELLO_API_KEY and TRELLO_TOKEN in .env.');
        }

        this.apiKey = options.apiKey;
        this.token = options.token;
        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            adapter: options.adapter,
            headers: {
                'Accept': 'application/json',
            },
        });
    }

    private auth(params: Record<string, string> = {}): Record<string, string> {
        return { ...params, key: this.apiKey, token: this.token };
    }

    async validateConnection(): Promise<boolean> {
        try {
            const me = await this.getMe();
            console.log(`   Trello token belongs to ${me.fullName || me.username || me.id}`);
            return true;
        } catch (error) {
            console.error('Failed to connect to Trello:', error);
            return false;
        }
    }

    async getMe(): Promise<TrelloMember> {
        const response = await this.client.get('/members/me', { params: this.auth({ fields: 'id,fullName,username' }) });
        return TrelloMember.parse(response.data);
    }

    /**
     * Cards of a board in board order. When `listIds` is non-empty only cards
     * sitting in one of those lists are returned.
     */
    async listCards(boardId: string, listIds: string[] = []): Promise<TrelloCard[]> {
        try {
            const response = await this.client.get(`/boards/${boardId}/cards`, {
                params: this.auth({ fields: CARD_FIELDS }),
            });
            const cards = z.array(TrelloCard).parse(response.data);
            if (listIds.length === 0) return cards;

            const wanted = new Set(listIds);
            return cards.filter(card => wanted.has(card.idList));
        } catch (error) {
            console.error(`Error fetching cards for board ${boardId}:`, error);
            throw error;
        }
    }

    async getActions(cardId: string): Promise<TrelloAction[]> {
        const response = await this.client.get(`/cards/${cardId}/actions`, {
            params: this.auth({ filter: 'commentCard,createCard', limit: '1000' }),
        });
        return z.array(TrelloAction).parse(response.data);
    }

    async getChecklists(cardId: string): Promise<TrelloChecklist[]> {
        const response = await this.client.get(`/cards/${cardId}/checklists`, { params: this.auth() });
        return z.array(TrelloChecklist).parse(response.data);
    }

    async getAttachments(cardId: string): Promise<TrelloAttachment[]> {
        const response = await this.client.get(`/cards/${cardId}/attachments`, { params: this.auth() });
        return z.array(TrelloAttachment).parse(response.data);
    }

    /**
     * Link attachments can point anywhere; the OAuth header only goes to
     * trello.com and its subdomains.
     */
    async downloadAttachment(url: string): Promise<Buffer> {
        const headers: Record<string, string> = {};
        if (isTrelloHost(url)) {
            headers['Authorization'] = `OAuth oauth_consumer_key="${this.apiKey}", oauth_token="${this.token}"`;
        }

        const response = await this.client.get<ArrayBuffer>(url, {
            responseType: 'arraybuffer',
            headers,
        });
        return Buffer.from(response.data);
    }
}

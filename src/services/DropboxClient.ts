import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { SharingApi, UploadInput } from '../types';
import {
    DropboxAccount,
    DropboxFileMetadata,
    DropboxSharedLink,
    DropboxSharedLinkList,
} from '../lib/schemas';

export interface DropboxClientOptions {
    token: string;
    apiUrl?: string;
    contentUrl?: string;
    timeoutMs?: number;
    adapter?: AxiosAdapter;
}

/**
 * The Dropbox-API-Arg header only carries ASCII; everything else goes as
 * JSON \u escapes.
 */
export function encodeApiArg(arg: object): string {
    return JSON.stringify(arg).replace(/[\u007f-\uffff]/g,
        ch => '\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0'));
}

export class DropboxClient implements SharingApi {
    private client: AxiosInstance;
    private apiUrl: string;
    private contentUrl: string;

    constructor(options: DropboxClientOptions) {
        if (!options.token) {
            throw new Error('Dropbox configuration missing. Set DROPBOX_TOKEN in .env.');
        }

        this.apiUrl = options.apiUrl || 'https://api.dropboxapi.com/2';
        this.contentUrl = options.contentUrl || 'https://content.dropboxapi.com/2';
        this.client = axios.create({
            timeout: options.timeoutMs,
            adapter: options.adapter,
            headers: {
                'Authorization': `Bearer ${options.token}`,
            },
        });
    }

    async validateConnection(): Promise<boolean> {
        try {
            const response = await this.client.post(`${this.apiUrl}/users/get_current_account`, null);
            DropboxAccount.parse(response.data);
            return true;
        } catch (error) {
            console.error('Failed to connect to Dropbox:', error);
            return false;
        }
    }

    async upload(input: UploadInput): Promise<DropboxFileMetadata> {
        const response = await this.client.post(`${this.contentUrl}/files/upload`, input.content, {
            headers: {
                'Content-Type': 'application/octet-stream',
                'Dropbox-API-Arg': encodeApiArg({
                    path: input.path,
                    mode: input.mode,
                    autorename: input.autorename,
                    mute: input.mute,
                    client_modified: input.clientModified,
                }),
            },
        });
        return DropboxFileMetadata.parse(response.data);
    }

    async listSharedLinks(path: string): Promise<DropboxSharedLink[]> {
        const response = await this.client.post(`${this.apiUrl}/sharing/list_shared_links`, {
            path,
            direct_only: true,
        });
        return DropboxSharedLinkList.parse(response.data).links;
    }

    async createSharedLink(path: string): Promise<DropboxSharedLink> {
        const response = await this.client.post(`${this.apiUrl}/sharing/create_shared_link_with_settings`, { path });
        return DropboxSharedLink.parse(response.data);
    }
}

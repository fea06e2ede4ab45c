import fs from 'fs';
import path from 'path';
import { logger } from '@retailops/service-template';
import { GatewayError } from '../errors';

export interface SearchHit {
    id: string;
    title: string;
    url: string;
}

export interface KnowledgeSection extends SearchHit {
    content: string;
}

/** Text search and fetch over the store knowledge base. */
export interface DocumentIndex {
    search(query: string, limit: number): Promise<SearchHit[]>;
    fetch(id: string): Promise<KnowledgeSection>;
}

export interface SourceDocument {
    /** File stem, e.g. `Returns_and_Holds_Policy`. */
    name: string;
    content: string;
}

const HEADING = /^\s*#{1,6}\s+\S+/;
const HEADING_PREFIX = /^\s*#{1,6}\s*/;

// Canonical doc paths that do not follow the file-stem slug.
const SLUG_OVERRIDES: Readonly<Record<string, string>> = {
    Returns_and_Holds_Policy: 'returns'
};

export const slugOf = (name: string): string => SLUG_OVERRIDES[name] ?? name.toLowerCase().replace(/_/g, '-');
const titleOf = (name: string): string => name.replace(/_/g, ' ');

const countOccurrences = (haystack: string, needle: string): number => {
    let count = 0;
    let from = haystack.indexOf(needle);
    while (from !== -1) {
        count += 1;
        from = haystack.indexOf(needle, from + needle.length);
    }
    return count;
};

export const splitSections = (document: SourceDocument, baseUrl: string): KnowledgeSection[] => {
    const lines = document.content.split(/\r?\n/);
    const headings = lines.flatMap((line, index) => (HEADING.test(line) ? [index] : []));
    const idFor = (n: number) => `doc:${document.name}#section-${n}`;
    const urlFor = (n: number) => `${baseUrl}/${slugOf(document.name)}#section-${n}`;

    if (headings.length === 0) {
        return [{ id: idFor(1), title: titleOf(document.name), url: urlFor(1), content: document.content.trim() }];
    }

    return headings.map((start, index) => {
        const end = index + 1 < headings.length ? headings[index + 1] : lines.length;
        const sectionLines = lines.slice(start, end);
        const heading = sectionLines[0].replace(HEADING_PREFIX, '').trim();
        const n = index + 1;
        return {
            id: idFor(n),
            title: `${titleOf(document.name)}: ${heading}`,
            url: urlFor(n),
            content: sectionLines.join('\n').trim()
        };
    });
};

export class MarkdownDocumentIndex implements DocumentIndex {
    private readonly sections = new Map<string, KnowledgeSection>();

    constructor(documents: SourceDocument[], baseUrl: string) {
        const base = baseUrl.replace(/\/+$/, '');
        const ordered = [...documents].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
        for (const document of ordered) {
            for (const section of splitSections(document, base)) {
                this.sections.set(section.id, section);
            }
        }
    }

    static fromDirectory(directory: string, baseUrl: string): MarkdownDocumentIndex {
        if (!fs.existsSync(directory)) {
            logger.warn(`Knowledge directory ${directory} not found; search will return no results`);
            return new MarkdownDocumentIndex([], baseUrl);
        }
        const documents = fs.readdirSync(directory)
            .filter((file) => file.endsWith('.md'))
            .map((file) => ({
                name: path.basename(file, '.md'),
                content: fs.readFileSync(path.join(directory, file), 'utf-8')
            }));
        logger.info(`Loaded ${documents.length} knowledge documents from ${directory}`);
        return new MarkdownDocumentIndex(documents, baseUrl);
    }

    get size(): number {
        return this.sections.size;
    }

    async search(query: string, limit: number): Promise<SearchHit[]> {
        const lowered = query.toLowerCase();
        const terms = lowered.match(/[a-z0-9]+/g) || [];
        const scored: { score: number; section: KnowledgeSection }[] = [];

        for (const section of this.sections.values()) {
            const haystack = `${section.title}\n${section.content}`.toLowerCase();
            let score = 1;
            if (terms.length > 0) {
                score = terms.reduce((total, term) => total + countOccurrences(haystack, term), 0);
                if (haystack.includes(lowered)) {
                    score += 2;
                }
            }
            if (score > 0) {
                scored.push({ score, section });
            }
        }

        scored.sort((a, b) => b.score - a.score || (a.section.id < b.section.id ? -1 : a.section.id > b.section.id ? 1 : 0));
        return scored.slice(0, limit).map(({ section }) => ({ id: section.id, title: section.title, url: section.url }));
    }

    async fetch(id: string): Promise<KnowledgeSection> {
        const section = this.sections.get(id);
        if (!section) {
            throw new GatewayError('InvalidArguments', `Unknown document id '${id}'`, {
                fallbackAction: 'Use an id returned by the search tool.'
            });
        }
        return { ...section };
    }
}

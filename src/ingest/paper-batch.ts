import type { Author, Paper, PaperAuthorLink } from '../types/index.js';

/**
 * Arena holding one ingestion batch: papers in input order, authors keyed by
 * UUID, and the links between them. Neither entity points back at the other;
 * both directions resolve through `links`.
 *
 * Links are keyed by the UUID a paper had when it was added. A merge may
 * later rewrite `paper.uuid` to a stored identity that another paper in the
 * batch already carries; the link key stays put.
 */
export class PaperBatch {
    readonly papers: Paper[] = [];
    readonly authors = new Map<string, Author>();
    readonly links: PaperAuthorLink[] = [];
    private readonly linkKeys = new Map<Paper, string>();

    get size(): number {
        return this.papers.length;
    }

    /**
     * Add a paper with its authors, in author order. The paper's
     * `author_uuids` is rewritten from the recorded links.
     */
    addPaper(paper: Paper, authors: readonly Author[] = []): Paper {
        const key = paper.uuid;
        for (const author of authors) {
            this.authors.set(author.uuid, author);
            this.links.push({ paper_uuid: key, author_uuid: author.uuid });
        }
        paper.author_uuids = authors.map((author) => author.uuid);
        this.linkKeys.set(paper, key);
        this.papers.push(paper);
        return paper;
    }

    /**
     * First paper currently carrying `uuid`.
     */
    getPaper(uuid: string): Paper | undefined {
        return this.papers.find((paper) => paper.uuid === uuid);
    }

    authorsOf(paper: Paper): Author[] {
        const key = this.linkKeys.get(paper);
        if (key === undefined) return [];

        const result: Author[] = [];
        for (const link of this.links) {
            if (link.paper_uuid !== key) continue;
            const author = this.authors.get(link.author_uuid);
            if (author) result.push(author);
        }
        return result;
    }

    papersOf(authorUuid: string): Paper[] {
        const keys = new Set(
            this.links.filter((link) => link.author_uuid === authorUuid).map((link) => link.paper_uuid)
        );
        return this.papers.filter((paper) => {
            const key = this.linkKeys.get(paper);
            return key !== undefined && keys.has(key);
        });
    }

    /**
     * Give a paper a new public identity. Its links are unaffected.
     */
    reassignPaper(paper: Paper, newUuid: string): void {
        paper.uuid = newUuid;
    }
}

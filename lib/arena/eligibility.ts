import { readFile } from "node:fs/promises";
import { z } from "zod";
import { ArenaPreconditionError, errorMessage } from "@/lib/arena/errors";
import { mathRandom, randomPick, type RandomSource } from "@/lib/arena/sampling";

export const DEFAULT_PAPERS_FILE = "arena_data/papers.json";

const paperSchema = z.object({
  paperId: z.string().min(1),
  title: z.string(),
  reviews: z.record(z.string().min(1), z.array(z.string())),
});

const papersFileSchema = z.array(paperSchema);

export type PaperEntry = z.infer<typeof paperSchema>;

/** Papers in arena order, each with the generated reviews per reviewer. */
export class PaperRegistry {
  private readonly papers: PaperEntry[];
  private readonly byId: Map<string, PaperEntry>;

  constructor(papers: readonly PaperEntry[]) {
    this.papers = [...papers];
    this.byId = new Map();
    for (const paper of this.papers) {
      if (this.byId.has(paper.paperId)) {
        throw new ArenaPreconditionError(`duplicate paper id: ${paper.paperId}`);
      }
      this.byId.set(paper.paperId, paper);
    }
  }

  static async fromFile(filePath: string = DEFAULT_PAPERS_FILE): Promise<PaperRegistry> {
    const raw = await readFile(filePath, "utf8");
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new ArenaPreconditionError(`invalid papers file ${filePath}: ${errorMessage(err)}`);
    }
    const parsed = papersFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new ArenaPreconditionError(`invalid papers file ${filePath}: ${parsed.error.message}`);
    }
    return new PaperRegistry(parsed.data);
  }

  get size(): number {
    return this.papers.length;
  }

  /** Wraps around past the end. */
  paperAt(position: number): PaperEntry {
    if (this.papers.length === 0) throw new ArenaPreconditionError("paper registry is empty");
    const index = ((Math.trunc(position) % this.papers.length) + this.papers.length) % this.papers.length;
    const paper = this.papers[index];
    if (!paper) throw new ArenaPreconditionError(`no paper at position ${position}`);
    return paper;
  }

  samplePosition(random: RandomSource = mathRandom): number {
    const position = randomPick(
      this.papers.map((_, index) => index),
      random,
    );
    if (position === null) throw new ArenaPreconditionError("paper registry is empty");
    return position;
  }

  get(paperId: string): PaperEntry {
    const paper = this.byId.get(paperId);
    if (!paper) throw new ArenaPreconditionError(`unknown paper: ${paperId}`);
    return paper;
  }

  /** Reviewers with at least one non-blank review for the paper. */
  eligibleReviewers(paperId: string): string[] {
    return Object.entries(this.get(paperId).reviews)
      .filter(([, reviews]) => validReviews(reviews).length > 0)
      .map(([reviewerId]) => reviewerId);
  }

  reviewsBy(paperId: string, reviewerId: string): string[] {
    return validReviews(this.get(paperId).reviews[reviewerId] ?? []);
  }
}

function validReviews(reviews: readonly string[]): string[] {
  return reviews.filter((review) => review.trim().length > 0);
}

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

export const SentDripPropsSchema = z.object({
  id: z.string().uuid(),
  dripId: z.string().uuid(),
  userId: z.string().min(1),
  subject: z.string(),
  body: z.string(),
  fromEmail: z.string().email().nullable(),
  fromEmailName: z.string().max(150).nullable(),
  replyTo: z.string().email().nullable(),
  name: z.string().max(255).nullable(),
  date: z.coerce.date(),
});

export type SentDripProps = z.infer<typeof SentDripPropsSchema>;

/** Evidence that a drip went out to a user; written once, never changed. */
export class SentDrip {
  private constructor(private readonly props: SentDripProps) {}

  static create(input: {
    dripId: string;
    userId: string;
    subject: string;
    body: string;
    fromEmail?: string | null;
    fromEmailName?: string | null;
    replyTo?: string | null;
    name?: string | null;
  }): SentDrip {
    return new SentDrip(
      SentDripPropsSchema.parse({
        id: randomUUID(),
        dripId: input.dripId,
        userId: input.userId,
        subject: input.subject,
        body: input.body,
        fromEmail: input.fromEmail ?? null,
        fromEmailName: input.fromEmailName ?? null,
        replyTo: input.replyTo ?? null,
        name: input.name ?? null,
        date: new Date(),
      }),
    );
  }

  static reconstitute(props: SentDripProps): SentDrip {
    return new SentDrip(SentDripPropsSchema.parse(props));
  }

  get id(): string {
    return this.props.id;
  }
  get dripId(): string {
    return this.props.dripId;
  }
  get userId(): string {
    return this.props.userId;
  }
  get subject(): string {
    return this.props.subject;
  }
  get body(): string {
    return this.props.body;
  }
  get date(): Date {
    return this.props.date;
  }

  toProps(): Readonly<SentDripProps> {
    return Object.freeze({ ...this.props });
  }
}

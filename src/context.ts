import { Env } from './config/env';
import { redis } from './config/redis';
import { queueJobScheduler } from './config/queue';
import { loadKnowledgeBase } from './config/knowledge';
import { CandidateRepository } from './types/candidate';
import { JobScheduler } from './types/jobs';
import { DatabaseService } from './services/database.service';
import { DedupService } from './services/dedup.service';
import { LLMFactory } from './services/llm.factory';
import { EscalationService } from './services/escalation.service';
import { MemoryService } from './services/memory.service';
import { DialogueService } from './services/dialogue.service';
import { HandoffService } from './services/handoff.service';
import { ConversationService } from './services/conversation.service';
import { ImportService } from './services/import.service';
import { AnalyticsService } from './services/analytics.service';
import { SendGridAdapter } from './services/email/sendgrid.adapter';
import { WhatsAppAdapter } from './services/whatsapp/whatsapp.adapter';
import { WhatsAppFactory } from './services/whatsapp/whatsapp.factory';

export interface AppContext {
  db: CandidateRepository;
  whatsapp: WhatsAppAdapter;
  jobs: JobScheduler;
  escalation: EscalationService;
  memory: MemoryService;
  handoff: HandoffService;
  conversation: ConversationService;
  importer: ImportService;
  analytics: AnalyticsService;
  email: SendGridAdapter;
}

/** Builds every service once; nothing below this reads process-wide configuration. */
export function createAppContext(config: Env): AppContext {
  const db = new DatabaseService();
  const llm = LLMFactory.create(config.LLM_PROVIDER, config);
  const models = LLMFactory.resolveModels(config.LLM_PROVIDER, config);
  const whatsapp = WhatsAppFactory.create(config.WHATSAPP_PROVIDER, config);
  const jobs = queueJobScheduler;

  const escalation = new EscalationService(llm, { classifierModel: models.classifier });
  const memory = new MemoryService(db, llm, { classifierModel: models.classifier });
  const dialogue = new DialogueService(db, llm, {
    mainModel: models.main,
    knowledgeBase: loadKnowledgeBase(config.KNOWLEDGE_BASE_PATH),
    recentTranscriptTurns: config.RECENT_TRANSCRIPT_TURNS,
  });
  const handoff = new HandoffService(db, whatsapp, jobs);
  const conversation = new ConversationService(
    { db, dedup: new DedupService(redis), escalation, dialogue, handoff, whatsapp, jobs },
    config.ESCALATION_POLICY
  );

  return {
    db,
    whatsapp,
    jobs,
    escalation,
    memory,
    handoff,
    conversation,
    importer: new ImportService(db, whatsapp),
    analytics: new AnalyticsService(db),
    email: new SendGridAdapter({ apiKey: config.SENDGRID_API_KEY, fromEmail: config.SENDGRID_FROM_EMAIL }),
  };
}

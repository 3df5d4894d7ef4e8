/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

/**
 * Service exports
 *
 * @packageDocumentation
 */

export { ConfigService } from './ConfigService';
export { OllamaLLMService } from './OllamaLLMService';
export { OpenAILLMService } from './OpenAILLMService';
export { LLMServiceFactory } from './LLMServiceFactory';
export { InMemoryEvidenceStore } from './InMemoryEvidenceStore';
export { PgEvidenceStore } from './PgEvidenceStore';
export { EvidenceStoreFactory } from './EvidenceStoreFactory';
export { CorpusLoader } from './CorpusLoader';
export { InMemoryUserTracker } from './InMemoryUserTracker';
export { PgUserTracker } from './PgUserTracker';
export { UserTrackerFactory } from './UserTrackerFactory';
export { RAGService } from './RAGService';

/**
 * Knowledge Retrieval API - GenAI Client Factory
 */

import { GoogleGenAI } from "@google/genai";
import { GENAI_MODE, PROJECT_ID, VERTEX_AI_LOCATION } from "./config";
import { errors } from "./errors";
import { logInfo, logError } from "./utils";

// =============================================================================
// Singleton Clients
// =============================================================================

let apiKeyClient: GoogleGenAI | null = null;
let vertexClient: GoogleGenAI | null = null;

function apiKey(): string | undefined {
  return process.env.GOOGLE_API_KEY || process.env.GEMINI_API_KEY;
}

// =============================================================================
// Availability Check
// =============================================================================

export function isGenAIAvailable(): boolean {
  if (GENAI_MODE === 'vertex') return PROJECT_ID !== 'local';
  return !!apiKey();
}

// =============================================================================
// Client Initialization
// =============================================================================

function getApiKeyClient(): GoogleGenAI {
  if (!apiKeyClient) {
    const key = apiKey();
    if (!key) {
      throw errors.providerNotInitialized('GENAI_MODE=apikey requires GOOGLE_API_KEY or GEMINI_API_KEY');
    }
    apiKeyClient = new GoogleGenAI({ apiKey: key });
    logInfo('GenAI client initialized', { mode: 'apikey' });
  }
  return apiKeyClient;
}

function getVertexClient(): GoogleGenAI {
  if (!vertexClient) {
    if (PROJECT_ID === 'local') {
      throw errors.providerNotInitialized('GENAI_MODE=vertex requires GOOGLE_CLOUD_PROJECT');
    }
    try {
      vertexClient = new GoogleGenAI({
        vertexai: true,
        project: PROJECT_ID,
        location: VERTEX_AI_LOCATION,
      });
      logInfo('GenAI client initialized', { mode: 'vertex', project: PROJECT_ID, location: VERTEX_AI_LOCATION });
    } catch (err) {
      logError('Failed to initialize Vertex AI client', err);
      throw errors.providerNotInitialized(`Failed to initialize Vertex AI: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return vertexClient;
}

export function getGenAIClient(): GoogleGenAI {
  return GENAI_MODE === 'vertex' ? getVertexClient() : getApiKeyClient();
}

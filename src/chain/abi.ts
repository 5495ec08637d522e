import { parseAbi, parseAbiItem } from 'viem';

// Identity registry
export const REGISTERED_EVENT = parseAbiItem(
  'event Registered(uint256 indexed agentId, string agentURI, address indexed owner)',
);
export const URI_UPDATED_EVENT = parseAbiItem(
  'event URIUpdated(uint256 indexed agentId, string newURI, address indexed updatedBy)',
);
/** Emitted by early registry deployments in place of URIUpdated */
export const AGENT_URI_UPDATED_EVENT = parseAbiItem('event AgentURIUpdated(uint256 indexed agentId, string agentURI)');
export const METADATA_SET_EVENT = parseAbiItem(
  'event MetadataSet(uint256 indexed agentId, string indexed indexedMetadataKey, string metadataKey, bytes metadataValue)',
);

// Reputation registry
export const NEW_FEEDBACK_EVENT = parseAbiItem(
  'event NewFeedback(uint256 indexed agentId, address indexed clientAddress, uint64 feedbackIndex, int128 value, uint8 valueDecimals, string indexed indexedTag1, string tag1, string tag2, string endpoint, string feedbackURI, bytes32 feedbackHash)',
);
export const FEEDBACK_REVOKED_EVENT = parseAbiItem(
  'event FeedbackRevoked(uint256 indexed agentId, address indexed clientAddress, uint64 indexed feedbackIndex)',
);

// Trust score oracle. Scores are 0-10000 (two implied decimals).
export const ORACLE_ABI = parseAbi([
  'function updateScoreBatch(uint256[] agentIds, uint256[] newScores)',
  'function getScoreView(uint256 agentId) view returns (uint256 score, uint256 lastUpdated, bool exists)',
]);

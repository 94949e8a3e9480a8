import { FastifyPluginAsync, FastifyRequest, FastifyReply } from 'fastify';
import type { Config } from '../../config/index.js';

type DiscoveryConfig = Config['discovery'];

const AUTHORIZATION_SERVER_DOCS = new Set(['oauth-authorization-server', 'openid-configuration']);
const PROTECTED_RESOURCE_DOC = 'oauth-protected-resource';

export function authorizationServerMetadata(discovery: DiscoveryConfig) {
  return {
    issuer: discovery.issuer,
    authorization_endpoint: discovery.authorization_endpoint,
    token_endpoint: discovery.token_endpoint,
    jwks_uri: discovery.jwks_uri,
    response_types_supported: discovery.response_types_supported,
    grant_types_supported: discovery.grant_types_supported,
    token_endpoint_auth_methods_supported: discovery.token_endpoint_auth_methods_supported,
    scopes_supported: discovery.scopes_supported,
  };
}

export function protectedResourceMetadata(discovery: DiscoveryConfig, origin: string) {
  return {
    resource: `${origin}/sse`,
    authorization_servers: [discovery.issuer],
    scopes_supported: discovery.scopes_supported,
  };
}

const discoveryRoute: FastifyPluginAsync = async (fastify) => {
  const { config } = fastify;

  const handleDiscovery = async (
    request: FastifyRequest<{ Params: { doc: string } }>,
    reply: FastifyReply
  ) => {
    const { doc } = request.params;

    if (AUTHORIZATION_SERVER_DOCS.has(doc)) {
      return authorizationServerMetadata(config.discovery);
    }

    if (doc === PROTECTED_RESOURCE_DOC) {
      const origin = `${request.protocol}://${request.hostname}`;
      return protectedResourceMetadata(config.discovery, origin);
    }

    return reply.code(404).send({ error: 'not_found' });
  };

  // Some clients append the resource path to the well-known document
  fastify.get<{ Params: { doc: string } }>('/.well-known/:doc', (request, reply) =>
    handleDiscovery(request, reply)
  );
  fastify.get<{ Params: { doc: string } }>('/.well-known/:doc/*', (request, reply) =>
    handleDiscovery(request, reply)
  );
  fastify.get<{ Params: { doc: string } }>('/sse/.well-known/:doc', (request, reply) =>
    handleDiscovery(request, reply)
  );
};

export default discoveryRoute;

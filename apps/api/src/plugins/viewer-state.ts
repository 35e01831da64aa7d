import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { FeedPoller } from '../feed/feed-poller';
import { SnapshotStore } from '../store/snapshot-store';

export interface ViewerStateOptions {
    store: SnapshotStore;
}

const viewerStatePlugin: FastifyPluginAsync<ViewerStateOptions> = async (fastify, opts) => {
    const feed = new FeedPoller(opts.store, fastify.log);

    fastify.decorate('snapshots', opts.store);
    fastify.decorate('feed', feed);

    fastify.addHook('onClose', async () => {
        await feed.stop();
    });
};

export default fp(viewerStatePlugin, {
    name: 'viewer-state'
});

declare module 'fastify' {
    interface FastifyInstance {
        snapshots: SnapshotStore;
        feed: FeedPoller;
    }
}

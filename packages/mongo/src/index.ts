export { MongoConfig } from "./mongo-config.js";
export {
	makeMongoDocumentStoreLayer,
	makeMongoStore,
	MongoLive,
	toDocument,
	toFindOptions,
	toSortSpec,
} from "./mongo-store-layer.js";

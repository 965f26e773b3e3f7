export { selectNewListings } from "./selectNewListings";
export { parseKnownIdentifiers, readKnownIdentifiers } from "./knownListings";
export { loadAlertDocuments } from "./loadAlertDocuments";

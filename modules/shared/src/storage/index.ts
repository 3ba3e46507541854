/**
 * Book Reservations - Storage Module
 *
 * Exports all storage operations for the DynamoDB Single Table Design.
 *
 * @module storage
 */

export type {
    StorageAdapterConfig,
    BookFields,
    NewBook,
    NewReservation,
    ReservationFilter,
    ProviderProfile,
    NewSession,
    NewLoginState,
    UpsertUserResult,
    UserStore,
    BookStore,
    ReservationStore,
    SessionStore,
} from './types';

export {
    withStorageFaults,
    isServiceFault,
    isUnreachableError,
    isConditionalCheckFailed,
    transactionConditionFailed,
} from './faults';

export {
    getUser,
    getUserBySubject,
    upsertUserFromProfile,
} from './user-operations';

export {
    createBook,
    getActiveBook,
    listActiveBooks,
    updateActiveBook,
    softDeleteBook,
} from './book-operations';

export {
    createReservation,
    getReservation,
    listReservations,
    cancelReservation,
} from './reservation-operations';

export {
    getSession,
    createSession,
    deleteSession,
    saveLoginState,
    consumeLoginState,
} from './session-operations';

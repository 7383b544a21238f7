import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.raw('CREATE EXTENSION IF NOT EXISTS "pgcrypto"');

  await knex.schema.createTable('escrow_listings', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('blockchain_listing_id', 66).notNullable().unique();
    table.string('seller_address', 42).notNullable();
    table.string('title', 200).notNullable();
    table.text('description').notNullable().defaultTo('');
    table.decimal('price', 38, 18).notNullable();
    table.string('currency', 16).notNullable();
    table.string('token_address', 42).notNullable();
    table.string('escrow_type', 32).notNullable();
    table.integer('listing_duration_days').notNullable();

    // api_approval parameters
    table.string('api_approval_method', 32);
    table.string('tweet_username', 64);
    table.string('crosschain_rpc_url', 512);
    table.string('crosschain_nft_contract', 42);
    table.string('crosschain_token_id', 78);

    // onchain_approval parameters
    table.string('onchain_destination', 42);
    table.text('onchain_call_data');
    table.text('onchain_expected_result');

    table.string('status', 32).notNullable().defaultTo('inactive');
    table.string('blockchain_status', 32).notNullable().defaultTo('pending_tx');
    table.string('creation_tx_hash', 66);
    table.string('cancel_tx_hash', 66);
    table.bigInteger('blockchain_expiration').notNullable();
    table.timestamp('delivered_at', { useTz: true });
    table.timestamps(true, true);

    table.index('seller_address');
    table.index('status');
  });

  await knex.schema.createTable('escrow_orders', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.string('order_id', 66).notNullable().unique();
    table.uuid('listing_id').notNullable().references('id').inTable('escrow_listings').onDelete('CASCADE');
    table.string('buyer_address', 42).notNullable();
    table.string('seller_address', 42).notNullable();
    table.decimal('amount', 38, 18).notNullable();
    table.string('token_address', 42).notNullable();
    table.bigInteger('deadline').notNullable();
    table.string('status', 32).notNullable().defaultTo('created');
    table.string('escrow_tx_hash', 66);
    table.string('delivery_tx_hash', 66);
    table.string('resolution_tx_hash', 66);
    table.string('dispute_tx_hash', 66);
    table.string('cancel_tx_hash', 66);
    table.timestamp('delivered_at', { useTz: true });
    table.timestamps(true, true);

    table.index('listing_id');
    table.index('buyer_address');
    table.index(['status', 'delivered_at']);
  });

  await knex.raw(
    'ALTER TABLE escrow_orders ADD CONSTRAINT chk_escrow_orders_distinct_parties CHECK (lower(buyer_address) <> lower(seller_address))'
  );

  await knex.schema.createTable('escrow_disputes', (table) => {
    table.uuid('id').primary().defaultTo(knex.raw('gen_random_uuid()'));
    table.uuid('order_id').notNullable().unique().references('id').inTable('escrow_orders').onDelete('CASCADE');
    table.string('initiator_address', 42).notNullable();
    table.text('reason').notNullable();
    table.string('status', 16).notNullable().defaultTo('open');
    table.string('arbitrator_result', 16);
    table.text('arbitrator_notes');
    table.string('tx_hash', 66).notNullable();
    table.timestamp('resolved_at', { useTz: true });
    table.timestamps(true, true);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('escrow_disputes');
  await knex.schema.dropTableIfExists('escrow_orders');
  await knex.schema.dropTableIfExists('escrow_listings');
}
